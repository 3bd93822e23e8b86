import { readFile } from 'fs/promises';
import type { FieldPermissions, ObjectPermissions, PermissionProfile } from '@txcache/core';

export interface PermissionsConfig {
  file?: string;
  json?: PermissionProfile;
}

type JsonObject = Record<string, unknown>;

const OBJECT_FLAGS = ['read', 'create', 'update', 'delete'] as const;
const FIELD_FLAGS = ['read', 'create', 'update'] as const;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFlag(entry: JsonObject, flag: string, path: string): boolean | undefined {
  const value = entry[flag];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid permissions: '${path}.${flag}' must be a boolean`);
  }
  return value;
}

function readLabel(entry: JsonObject, path: string): string | undefined {
  const value = entry.label;
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Invalid permissions: '${path}.label' must be a string`);
  }
  return value;
}

function parseField(entry: unknown, path: string): FieldPermissions {
  if (!isObject(entry)) {
    throw new Error(`Invalid permissions: '${path}' must be an object`);
  }

  const field: FieldPermissions = { label: readLabel(entry, path) };
  for (const flag of FIELD_FLAGS) {
    field[flag] = readFlag(entry, flag, path);
  }
  return field;
}

function parseObject(entry: unknown, path: string): ObjectPermissions {
  if (!isObject(entry)) {
    throw new Error(`Invalid permissions: object '${path}' must be an object`);
  }

  const object: ObjectPermissions = { label: readLabel(entry, path) };
  for (const flag of OBJECT_FLAGS) {
    object[flag] = readFlag(entry, flag, path);
  }

  if (entry.fields !== undefined) {
    if (!isObject(entry.fields)) {
      throw new Error(`Invalid permissions: '${path}.fields' must be an object`);
    }
    // fromEntries defines own properties, so a "__proto__" name stays a plain key
    object.fields = Object.fromEntries(
      Object.entries(entry.fields).map(([name, field]): [string, FieldPermissions] => [
        name,
        parseField(field, `${path}.fields.${name}`),
      ])
    );
  }

  return object;
}

/**
 * Validate a parsed permission profile
 */
export function parsePermissions(raw: unknown): PermissionProfile {
  if (!isObject(raw) || typeof raw.version !== 'number') {
    throw new Error('Invalid permissions: missing or invalid version field');
  }

  if (!isObject(raw.objects) || Object.keys(raw.objects).length === 0) {
    throw new Error('Invalid permissions: objects must be a non-empty object');
  }

  const objects: Record<string, ObjectPermissions> = Object.fromEntries(
    Object.entries(raw.objects).map(([name, entry]): [string, ObjectPermissions] => [
      name,
      parseObject(entry, name),
    ])
  );

  return { version: raw.version, objects };
}

/**
 * Load and validate a permission profile
 * Priority: file > json
 */
export async function loadPermissions(config: PermissionsConfig): Promise<PermissionProfile> {
  let raw: unknown;

  // Priority 1: Load from file
  if (config.file) {
    try {
      const content = await readFile(config.file, 'utf-8');
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load permissions from ${config.file}: ${reason}`);
    }
  }
  // Priority 2: Use inline JSON
  else if (config.json) {
    raw = config.json;
  }
  // No profile provided
  else {
    throw new Error('No permissions provided. Specify permissions.file or permissions.json.');
  }

  return parsePermissions(raw);
}
