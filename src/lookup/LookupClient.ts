import { Logger } from '@/lib/logger/Logger';
import { SecondaryLookupError, SyncError, TransportError, toError } from '@/lib/errors/SyncErrors';
import {
  AllowedOptionsResponseSchema,
  AssignedRolesResponseSchema,
} from '@/lib/validation/schemas';
import type { LookupRequest } from './LookupRequest';
import type { AllowedOption, LookupResult, OwnerId } from '@/types';

const logger = new Logger('LookupClient');

export interface LookupEndpoints {
  /** Allowed dependent options for an owner */
  allowedOptions: string;
  /** Secondary identifiers already assigned to an owner */
  assignedSecondary: string;
  /** Query parameter carrying the owner id */
  ownerParam: string;
}

/**
 * Read-only lookups keyed by owner
 */
export class LookupClient {
  constructor(
    private request: LookupRequest,
    private endpoints: LookupEndpoints
  ) {}

  /**
   * Fetch the dependent options allowed for an owner.
   * Never rejects: failures come back as `{ ok: false }`.
   */
  async fetchAllowedOptions(ownerId: OwnerId): Promise<LookupResult<AllowedOption[]>> {
    if (!ownerId.trim()) {
      logger.debug('No owner, skipping allowed options lookup');
      return { ok: true, data: [] };
    }

    try {
      const payload = await this.request.get(
        this.endpoints.allowedOptions,
        this.query(ownerId),
        AllowedOptionsResponseSchema
      );
      logger.debug(`Received ${payload.processus.length} allowed option(s) for owner`, ownerId);
      return { ok: true, data: payload.processus };
    } catch (error) {
      logger.error('Failed to load allowed options:', error);
      return {
        ok: false,
        error:
          error instanceof SyncError
            ? error
            : new TransportError('Allowed options lookup failed', undefined, undefined, toError(error)),
      };
    }
  }

  /**
   * Fetch the secondary identifiers already assigned to an owner.
   * Best effort: failures are logged and yield an empty list.
   */
  async fetchAssignedSecondary(ownerId: OwnerId): Promise<string[]> {
    if (!ownerId.trim()) {
      return [];
    }

    try {
      const payload = await this.request.get(
        this.endpoints.assignedSecondary,
        this.query(ownerId),
        AssignedRolesResponseSchema
      );
      return payload.roles.map((role) => role.role_uuid);
    } catch (error) {
      logger.warn(
        'Assigned secondary lookup failed:',
        new SecondaryLookupError('Assigned secondary lookup failed', toError(error))
      );
      return [];
    }
  }

  private query(ownerId: OwnerId): Record<string, string> {
    return { [this.endpoints.ownerParam]: ownerId };
  }
}
