import { describe, it, expect, vi } from 'vitest';
import { AccessGuard } from '../access/guard';
import { AccessDeniedError, formatDenial, isAccessDeniedError } from '../access/errors';
import { silentLogger } from '../logger';
import type { PermissionProfile } from '../types';

const profile: PermissionProfile = {
  version: 1,
  objects: {
    Account: {
      label: 'Customer Account',
      read: true,
      create: true,
      update: false,
      delete: false,
      fields: {
        Name: { label: 'Account Name', read: true, create: true, update: false },
        Secret: { read: false },
      },
    },
    Contact: { read: true, delete: true },
  },
};

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('AccessGuard', () => {
  it('should allow permitted object and field access', () => {
    const guard = new AccessGuard({ profile, logger: silentLogger });

    expect(() => guard.checkReadable('Account', ['Name'])).not.toThrow();
    expect(() => guard.checkInsertable('Account', ['Name'])).not.toThrow();
    expect(() => guard.checkDeletable('Contact')).not.toThrow();
  });

  it('should deny an unreadable field with a labelled message', () => {
    const guard = new AccessGuard({ profile, logger: silentLogger });

    const error = captureError(() => guard.checkReadable('Account', ['Name', 'Secret']));

    expect(error).toBeInstanceOf(AccessDeniedError);
    expect(isAccessDeniedError(error)).toBe(true);
    if (!isAccessDeniedError(error)) return;
    expect(error.name).toBe('AccessDeniedError');
    expect(error.denial).toEqual({
      kind: 'field',
      operation: 'read',
      objectType: 'Account',
      field: 'Secret',
    });
    expect(error.message).toBe('Insufficient access to read field Secret on Customer Account');
  });

  it('should deny fields missing from the profile', () => {
    const guard = new AccessGuard({ profile, logger: silentLogger });

    expect(() => guard.checkInsertable('Account', ['Missing'])).toThrow(
      'Insufficient access to create field Missing on Customer Account'
    );
  });

  it('should check the object before its fields', () => {
    const guard = new AccessGuard({ profile, logger: silentLogger });

    const error = captureError(() => guard.checkUpdateable('Account', ['Name']));

    expect(isAccessDeniedError(error) && error.denial).toEqual({
      kind: 'object',
      operation: 'update',
      objectType: 'Account',
    });
    expect(isAccessDeniedError(error) && error.message).toBe(
      'Insufficient access to update Customer Account'
    );
  });

  it('should deny unknown object types', () => {
    const guard = new AccessGuard({ profile, logger: silentLogger });

    expect(() => guard.checkReadable('Lead')).toThrow('Insufficient access to read Lead');
    expect(() => guard.checkDeletable('Account')).toThrow(
      'Insufficient access to delete Customer Account'
    );
  });

  it('should return denials from evaluate instead of throwing', () => {
    const guard = new AccessGuard({ profile, logger: silentLogger });

    expect(guard.evaluate('read', 'Contact')).toBeUndefined();
    expect(guard.evaluate('create', 'Contact', ['Email'])).toEqual({
      kind: 'object',
      operation: 'create',
      objectType: 'Contact',
    });
  });

  it('should skip every check while bypassed', () => {
    const logger = { ...silentLogger, warn: vi.fn() };
    const guard = new AccessGuard({ profile, logger });

    guard.setBypass(true);
    guard.setBypass(true);

    expect(guard.isBypassed()).toBe(true);
    expect(() => guard.checkDeletable('Account')).not.toThrow();
    expect(guard.evaluate('read', 'Lead', ['Anything'])).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledTimes(1);

    guard.setBypass(false);
    expect(() => guard.checkDeletable('Account')).toThrow(AccessDeniedError);
  });

  it('should honour the bypass option', () => {
    const guard = new AccessGuard({ profile, bypass: true, logger: silentLogger });

    expect(() => guard.checkReadable('Lead')).not.toThrow();
  });
});

describe('formatDenial', () => {
  it('should fall back to API names without labels', () => {
    expect(formatDenial({ kind: 'object', operation: 'delete', objectType: 'Contact' })).toBe(
      'Insufficient access to delete Contact'
    );
  });

  it('should use object and field labels', () => {
    expect(
      formatDenial(
        { kind: 'field', operation: 'update', objectType: 'Account', field: 'Name' },
        { object: 'Customer Account', field: 'Account Name' }
      )
    ).toBe('Insufficient access to update field Account Name on Customer Account');
  });

  it('should not classify other errors as access denials', () => {
    expect(isAccessDeniedError(new Error('Insufficient access'))).toBe(false);
  });
});
