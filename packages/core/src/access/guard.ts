import type { AccessOperation, PermissionProfile } from '../types';
import type { Logger } from '../logger';
import { consoleLogger } from '../logger';
import { AccessDeniedError, formatDenial, type AccessDenial } from './errors';

export interface AccessGuardOptions {
  profile: PermissionProfile;
  bypass?: boolean; // Default: false
  logger?: Logger; // Default: consoleLogger
}

/**
 * Object- and field-level permission pre-checks.
 *
 * Object types and fields missing from the profile are denied.
 * Delete checks are object-level only.
 */
export class AccessGuard {
  private readonly profile: PermissionProfile;
  private readonly logger: Logger;
  private bypass: boolean;

  constructor(options: AccessGuardOptions) {
    this.profile = options.profile;
    this.bypass = options.bypass ?? false;
    this.logger = options.logger ?? consoleLogger;
  }

  setBypass(enabled: boolean): void {
    if (enabled && !this.bypass) {
      this.logger.warn('AccessGuard bypass enabled: permission checks are skipped');
    }
    this.bypass = enabled;
  }

  isBypassed(): boolean {
    return this.bypass;
  }

  checkReadable(objectType: string, fields: Iterable<string> = []): void {
    this.enforce('read', objectType, fields);
  }

  checkInsertable(objectType: string, fields: Iterable<string> = []): void {
    this.enforce('create', objectType, fields);
  }

  checkUpdateable(objectType: string, fields: Iterable<string> = []): void {
    this.enforce('update', objectType, fields);
  }

  checkDeletable(objectType: string): void {
    this.enforce('delete', objectType, []);
  }

  /**
   * Return the first denial for the operation, or undefined when allowed
   */
  evaluate(
    operation: AccessOperation,
    objectType: string,
    fields: Iterable<string> = []
  ): AccessDenial | undefined {
    if (this.bypass) return undefined;

    const object = this.profile.objects[objectType];
    if (!object || object[operation] !== true) {
      return { kind: 'object', operation, objectType };
    }

    if (operation === 'delete') return undefined;

    for (const field of fields) {
      const permissions = object.fields?.[field];
      if (!permissions || permissions[operation] !== true) {
        return { kind: 'field', operation, objectType, field };
      }
    }

    return undefined;
  }

  private enforce(operation: AccessOperation, objectType: string, fields: Iterable<string>): void {
    const denial = this.evaluate(operation, objectType, fields);
    if (!denial) return;

    const object = this.profile.objects[denial.objectType];
    const message = formatDenial(denial, {
      object: object?.label,
      field: denial.kind === 'field' ? object?.fields?.[denial.field]?.label : undefined,
    });

    this.logger.debug?.(`AccessGuard denied: ${message}`);
    throw new AccessDeniedError(denial, message);
  }
}
