import { ParseError, errorMessage } from './errors.js';
import { STDIO_PORT } from '../types/Target.js';
import type { DeviceConnection, TargetDescriptor } from '../types/Target.js';

const DEVICE_ID_PATTERN = /^[0-9a-f]{64}$/;
const UDP_SUFFIX = '/udp';
const MAX_PORT = 65535;

/** Device identifiers are the hex-encoded SHA-256 digest of the device public key. */
export function isValidDeviceId(deviceId: string): boolean {
  return DEVICE_ID_PATTERN.test(deviceId);
}

export function assertValidDeviceId(deviceId: string): void {
  if (!isValidDeviceId(deviceId)) {
    throw new ParseError(`invalid device ID ${deviceId}`);
  }
}

export function parsePort(value: string): number {
  if (value === '') {
    throw new ParseError('empty port');
  }

  if (!/^\d+$/.test(value)) {
    throw new ParseError('invalid port number');
  }

  const port = Number(value);
  if (port > MAX_PORT) {
    throw new ParseError('invalid port number');
  }

  return port;
}

function parseLocalPort(value: string): number | typeof STDIO_PORT {
  if (value === STDIO_PORT) {
    return STDIO_PORT;
  }
  return parsePort(value);
}

/**
 * Parses `[<localHost>:]<localPort>:<remoteHost>:<remotePort>[/udp]`.
 *
 * Only the shape and the ports are checked; host names are taken as-is.
 */
export function parseTarget(value: string): TargetDescriptor {
  const parts = value.split(':');

  if (parts.length !== 3 && parts.length !== 4) {
    throw new ParseError('invalid format');
  }

  const [localHost, localPortField, remoteHost, remotePortField] =
    parts.length === 3 ? ['localhost', ...parts] : parts;

  let localPort: number | typeof STDIO_PORT;
  try {
    localPort = parseLocalPort(localPortField);
  } catch (err) {
    throw new ParseError(`invalid local port: ${errorMessage(err)}`);
  }

  const isUdp = remotePortField.endsWith(UDP_SUFFIX);
  const remotePortValue = isUdp ? remotePortField.slice(0, -UDP_SUFFIX.length) : remotePortField;

  let remotePort: number;
  try {
    remotePort = parsePort(remotePortValue);
  } catch (err) {
    throw new ParseError(`invalid remote port: ${errorMessage(err)}`);
  }

  return {
    protocol: isUdp ? 'udp' : 'tcp',
    localHost,
    localPort,
    remoteHost,
    remotePort,
  };
}

/** Canonical four-field form of a target. */
export function formatTarget(target: TargetDescriptor): string {
  const base = `${target.localHost}:${target.localPort}:${target.remoteHost}:${target.remotePort}`;
  return target.protocol === 'udp' ? `${base}${UDP_SUFFIX}` : base;
}

/** Splits a comma-separated `--target` value. */
export function splitTargets(value: string): string[] {
  return value
    .split(',')
    .map((target) => target.trim())
    .filter((target) => target !== '');
}

/**
 * Validates a connection request and parses its targets.
 *
 * `stdio` must be the only target of a request.
 */
export function parseDeviceConnection(connection: DeviceConnection): TargetDescriptor[] {
  assertValidDeviceId(connection.deviceId);

  const targets = connection.targets.map((value) => {
    try {
      return parseTarget(value);
    } catch (err) {
      throw new ParseError(`error parsing target ${value}: ${errorMessage(err)}`);
    }
  });

  if (targets.length === 0) {
    throw new ParseError(`no targets defined for device ${connection.deviceId}`);
  }

  if (targets.length > 1 && targets.some((target) => target.localPort === STDIO_PORT)) {
    throw new ParseError('stdio is only supported for single target connections');
  }

  return targets;
}
