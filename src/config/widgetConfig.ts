import { SELECTORS } from '@/config/constants';
import { Logger } from '@/lib/logger/Logger';
import { WidgetConfigSchema, parseWithDefault } from '@/lib/validation/schemas';
import type { WidgetConfig } from '@/lib/validation/schemas';

const logger = new Logger('WidgetConfig');

/**
 * Configuration with every default applied
 */
export function defaultWidgetConfig(): WidgetConfig {
  return WidgetConfigSchema.parse({});
}

/**
 * Read per-page overrides from the inline JSON config element.
 * Missing, unparsable or invalid configuration falls back to the defaults.
 */
export function readWidgetConfig(doc: Document = document): WidgetConfig {
  const text = doc.querySelector(SELECTORS.CONFIG_SCRIPT)?.textContent?.trim();
  if (!text) {
    return defaultWidgetConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    logger.error('Widget configuration is not valid JSON, using defaults:', error);
    return defaultWidgetConfig();
  }

  return parseWithDefault(WidgetConfigSchema, raw, defaultWidgetConfig());
}
