import { validate as isUuid } from 'uuid';
import { EdgeVersion } from '../types/Device.js';
import type { DeviceStatus, ResolvedDevice } from '../types/Device.js';
import type { ManagementClient } from './ManagementClient.js';
import { errorMessage, ResolutionError } from '../utils/errors.js';

/** The part of the management API the resolver needs */
export type DeviceLookup = Pick<ManagementClient, 'getDeviceStatus' | 'listDeviceInventory'>;

// Local and test edges present self-signed certificates
const RELAXED_TLS_PREFIXES = ['edge:', 'localhost:'];

function toEdgeVersion(value: number | undefined): EdgeVersion {
  return value === EdgeVersion.Native ? EdgeVersion.Native : EdgeVersion.Legacy;
}

export function edgeUrl(device: Pick<ResolvedDevice, 'edgeHost' | 'uuid'>): string {
  return `wss://${device.edgeHost}/device/${device.uuid}`;
}

export function requiresRelaxedTls(edgeHost: string): boolean {
  return RELAXED_TLS_PREFIXES.some((prefix) => edgeHost.startsWith(prefix));
}

/**
 * Looks up where a device's remote access terminates. Statuses are fetched
 * fresh for every session; a device can move between edges at any time.
 */
export class DeviceStatusResolver {
  constructor(private readonly api: DeviceLookup) {}

  async resolve(deviceId: string, signal?: AbortSignal): Promise<ResolvedDevice> {
    let status: DeviceStatus;
    try {
      status = await this.api.getDeviceStatus(deviceId, signal);
    } catch (err) {
      throw new ResolutionError(`error looking up device ${deviceId}: ${errorMessage(err)}`, { cause: err });
    }

    if (!status.remote_access || !status.edge) {
      throw new ResolutionError(`remote access is not available for device ${deviceId}`);
    }

    return {
      deviceId,
      uuid: status.uuid,
      edgeHost: status.edge,
      edgeVersion: toEdgeVersion(status.edge_version),
    };
  }

  /**
   * Maps a device UUID to its public key digest through the inventory.
   * Anything that is not a UUID is returned as it is.
   */
  async resolveDeviceIdentifier(id: string, signal?: AbortSignal): Promise<string> {
    if (!isUuid(id)) {
      return id;
    }

    const inventory = await this.api.listDeviceInventory({ uuid: id }, signal);

    if (inventory.items.length === 0) {
      throw new ResolutionError('device not found');
    }

    if (inventory.items.length > 1) {
      throw new ResolutionError('multiple devices found');
    }

    return inventory.items[0].pub_key_digest;
  }
}
