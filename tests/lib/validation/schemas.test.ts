import { describe, it, expect, vi } from 'vitest';
import {
  AllowedOptionsResponseSchema,
  AssignedRolesResponseSchema,
  ServerErrorBodySchema,
  WidgetConfigSchema,
  describeIssues,
  parseWithDefault,
  safeParse,
} from '../../../src/lib/validation/schemas';

describe('AllowedOptionsResponseSchema', () => {
  it('keeps extra option fields', () => {
    const parsed = AllowedOptionsResponseSchema.parse({
      processus: [{ uuid: 'p-1', nom: 'Purchasing', numero_processus: 'PRS-01' }],
    });
    expect(parsed.processus).toEqual([{ uuid: 'p-1', nom: 'Purchasing', numero_processus: 'PRS-01' }]);
  });

  it('treats a missing list as no options', () => {
    expect(AllowedOptionsResponseSchema.parse({}).processus).toEqual([]);
  });

  it('stringifies numeric identifiers', () => {
    expect(AllowedOptionsResponseSchema.parse({ processus: [{ uuid: 12 }] }).processus[0].uuid).toBe('12');
  });

  it('rejects options without identifier', () => {
    const result = safeParse(AllowedOptionsResponseSchema, { processus: [{ nom: 'x' }] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(describeIssues(result.error)).toMatch(/^processus\.0\.uuid: /);
    }
  });

  it('rejects a list of the wrong type', () => {
    expect(AllowedOptionsResponseSchema.safeParse({ processus: 'p-1' }).success).toBe(false);
  });
});

describe('AssignedRolesResponseSchema', () => {
  it('parses role identifiers', () => {
    const parsed = AssignedRolesResponseSchema.parse({
      roles: [{ role_uuid: 'r-1', role_nom: 'Admin' }, { role_uuid: 'r-2' }],
    });
    expect(parsed.roles.map((role) => role.role_uuid)).toEqual(['r-1', 'r-2']);
  });
});

describe('ServerErrorBodySchema', () => {
  it('requires a string error', () => {
    expect(ServerErrorBodySchema.safeParse({ error: 'db down' }).success).toBe(true);
    expect(ServerErrorBodySchema.safeParse({ detail: 'db down' }).success).toBe(false);
  });
});

describe('WidgetConfigSchema', () => {
  it('fills every default from an empty object', () => {
    const config = WidgetConfigSchema.parse({});
    expect(config.endpoints.allowedOptions).toBe('/admin/parametre/userprocessusrole/get_processus/');
    expect(config.endpoints.assignmentScreen).toBe('/admin/parametre/userprocessus/add/');
    expect(config.ownerParam).toBe('owner_id');
    expect(config.selectors.owner).toBe('#id_user');
    expect(config.selectors.styledLists).toContain('ul.compact-checkboxes');
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.debug).toBe(false);
  });

  it('keeps defaults for keys a partial override leaves out', () => {
    const config = WidgetConfigSchema.parse({ selectors: { owner: '#id_owner' }, ownerParam: 'user_id' });
    expect(config.selectors.owner).toBe('#id_owner');
    expect(config.selectors.dependentField).toBe('.field-processus_multiple');
    expect(config.ownerParam).toBe('user_id');
  });
});

describe('parseWithDefault', () => {
  it('returns the fallback on invalid data', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const fallback = WidgetConfigSchema.parse({});
    expect(parseWithDefault(WidgetConfigSchema, { requestTimeoutMs: -5 }, fallback)).toBe(fallback);
  });
});
