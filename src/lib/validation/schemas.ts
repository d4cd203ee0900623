import { z } from 'zod';
import { ENDPOINTS, NETWORK, SELECTORS } from '@/config/constants';

/**
 * Identifiers may come back as numbers from some serializers
 */
const IdentifierSchema = z.union([z.string(), z.number()]).transform(String);

/**
 * Allowed dependent option schema
 */
export const AllowedOptionSchema = z
  .object({
    uuid: IdentifierSchema,
  })
  .catchall(z.unknown());

/**
 * Allowed options lookup response; a missing list means "no options"
 */
export const AllowedOptionsResponseSchema = z.object({
  processus: z.array(AllowedOptionSchema).optional().default([]),
});

/**
 * Assigned secondary entry schema
 */
export const AssignedRoleSchema = z
  .object({
    role_uuid: IdentifierSchema,
  })
  .catchall(z.unknown());

/**
 * Assigned secondary lookup response
 */
export const AssignedRolesResponseSchema = z.object({
  roles: z.array(AssignedRoleSchema).optional().default([]),
});

/**
 * Error body a server may send along with a 500
 */
export const ServerErrorBodySchema = z.object({
  error: z.string(),
});

/**
 * Per-page widget configuration
 */
export const WidgetConfigSchema = z.object({
  endpoints: z
    .object({
      allowedOptions: z.string().min(1).default(ENDPOINTS.ALLOWED_OPTIONS),
      assignedSecondary: z.string().min(1).default(ENDPOINTS.ASSIGNED_SECONDARY),
      assignmentScreen: z.string().min(1).default(ENDPOINTS.ASSIGNMENT_SCREEN),
    })
    .default({}),
  ownerParam: z.string().min(1).default(ENDPOINTS.OWNER_PARAM),
  selectors: z
    .object({
      owner: z.string().min(1).default(SELECTORS.OWNER),
      dependentField: z.string().min(1).default(SELECTORS.DEPENDENT_FIELD),
      secondaryList: z.string().min(1).default(SELECTORS.SECONDARY_LIST),
      styledLists: z.array(z.string().min(1)).default([...SELECTORS.STYLED_LISTS]),
    })
    .default({}),
  requestTimeoutMs: z.number().int().positive().default(NETWORK.REQUEST_TIMEOUT_MS),
  debug: z.boolean().default(false),
});

export type WidgetConfig = z.infer<typeof WidgetConfigSchema>;

/**
 * Validation helper - parse with default
 */
export function parseWithDefault<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  defaultValue: z.infer<T>
): z.infer<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  console.error('Validation error, using default:', result.error.issues);
  return defaultValue;
}

/**
 * Validation helper - safe parse
 */
export function safeParse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): { success: true; data: z.infer<T> } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Human-readable summary of validation issues
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
