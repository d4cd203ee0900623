/**
 * Widget Entry Point
 */

import { Logger, initializeLogger } from '@/lib/logger/Logger';
import { readWidgetConfig } from '@/config/widgetConfig';
import { WidgetHandler } from './WidgetHandler';

const logger = new Logger('Widget');

/**
 * Initialize the widget on the current admin page
 */
async function initializeWidget(): Promise<void> {
  try {
    const config = readWidgetConfig(document);
    initializeLogger(config.debug);

    const handler = new WidgetHandler(config);
    const attached = await handler.attach();
    if (attached) {
      logger.important('Widget initialized');
    }
  } catch (error) {
    logger.error('Failed to initialize widget:', error);
  }
}

// Auto-initialize when DOM is ready
if (document.readyState === 'loading') {
  document.addEventListener('DOMContentLoaded', () => {
    void initializeWidget();
  });
} else {
  void initializeWidget();
}
