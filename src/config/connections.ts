import { readFile } from 'fs/promises';
import type { DeviceConnection } from '../types/Target.js';
import { errorMessage, ParseError } from '../utils/errors.js';

function toConnection(value: unknown, index: number): DeviceConnection {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`connection ${index} is not an object`);
  }

  const deviceId: unknown = 'device_id' in value ? value.device_id : undefined;
  const targets: unknown = 'targets' in value ? value.targets : undefined;

  if (typeof deviceId !== 'string') {
    throw new Error(`connection ${index} has no device_id`);
  }
  if (!Array.isArray(targets) || !targets.every((target): target is string => typeof target === 'string')) {
    throw new Error(`targets of connection ${index} must be a list of strings`);
  }

  return { deviceId, targets };
}

/**
 * Reads a JSON list of `{ "device_id": "...", "targets": ["..."] }`.
 * Targets are checked later, together with the device id.
 */
export async function loadConnectionsFile(path: string): Promise<DeviceConnection[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ParseError(`error reading config file: ${errorMessage(err)}`);
  }

  let connections: DeviceConnection[];
  try {
    const parsed: unknown = JSON.parse(content);
    if (!Array.isArray(parsed)) {
      throw new Error('expected a list of connections');
    }
    connections = parsed.map(toConnection);
  } catch (err) {
    throw new ParseError(`error parsing config file: ${errorMessage(err)}`);
  }

  if (connections.length === 0) {
    throw new ParseError('no connections defined in config file');
  }

  return connections;
}
