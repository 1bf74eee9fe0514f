import { describe, it, expect, vi } from 'vitest';
import { DeviceStatusResolver, edgeUrl, requiresRelaxedTls } from './DeviceStatusResolver.js';
import type { DeviceLookup } from './DeviceStatusResolver.js';
import { EdgeVersion } from '../types/Device.js';
import type { DeviceStatus, InventoryItem } from '../types/Device.js';
import { ApiError, ResolutionError } from '../utils/errors.js';

const DEVICE_ID = 'a'.repeat(64);
const DEVICE_UUID = '1b4e28ba-2fa1-4d3b-a3f5-ef19b5a7633b';

function lookup(status: DeviceStatus | Error, items: InventoryItem[] = []): DeviceLookup {
  return {
    getDeviceStatus: vi.fn(async () => {
      if (status instanceof Error) throw status;
      return status;
    }),
    listDeviceInventory: vi.fn(async () => ({ items, total: items.length })),
  };
}

describe('DeviceStatusResolver', () => {
  it('returns the edge of a device with remote access', async () => {
    const resolver = new DeviceStatusResolver(
      lookup({ uuid: DEVICE_UUID, remote_access: true, edge: 'edge-1.example.test:443', edge_version: 1 }),
    );

    await expect(resolver.resolve(DEVICE_ID)).resolves.toEqual({
      deviceId: DEVICE_ID,
      uuid: DEVICE_UUID,
      edgeHost: 'edge-1.example.test:443',
      edgeVersion: EdgeVersion.Native,
    });
  });

  it('treats a missing edge version as legacy', async () => {
    const resolver = new DeviceStatusResolver(lookup({ uuid: DEVICE_UUID, remote_access: true, edge: 'vpn:443' }));

    const device = await resolver.resolve(DEVICE_ID);
    expect(device.edgeVersion).toBe(EdgeVersion.Legacy);
  });

  it('rejects devices without remote access', async () => {
    const resolver = new DeviceStatusResolver(lookup({ uuid: DEVICE_UUID, remote_access: false }));

    await expect(resolver.resolve(DEVICE_ID)).rejects.toThrow(`remote access is not available for device ${DEVICE_ID}`);
  });

  it('wraps lookup failures', async () => {
    const resolver = new DeviceStatusResolver(lookup(new ApiError(404, { error: 'not found' })));

    const failure = resolver.resolve(DEVICE_ID);
    await expect(failure).rejects.toBeInstanceOf(ResolutionError);
    await expect(failure).rejects.toThrow(`error looking up device ${DEVICE_ID}: {"error":"not found"}`);
  });

  describe('resolveDeviceIdentifier', () => {
    const status: DeviceStatus = { uuid: DEVICE_UUID, remote_access: true };

    it('passes through identifiers that are not UUIDs', async () => {
      const api = lookup(status);
      const resolver = new DeviceStatusResolver(api);

      await expect(resolver.resolveDeviceIdentifier(DEVICE_ID)).resolves.toBe(DEVICE_ID);
      expect(api.listDeviceInventory).not.toHaveBeenCalled();
    });

    it('maps a UUID to the public key digest', async () => {
      const api = lookup(status, [{ pub_key_digest: DEVICE_ID, uuid: DEVICE_UUID }]);
      const resolver = new DeviceStatusResolver(api);

      await expect(resolver.resolveDeviceIdentifier(DEVICE_UUID)).resolves.toBe(DEVICE_ID);
      expect(api.listDeviceInventory).toHaveBeenCalledWith({ uuid: DEVICE_UUID }, undefined);
    });

    it('fails when no device or several devices match', async () => {
      await expect(new DeviceStatusResolver(lookup(status)).resolveDeviceIdentifier(DEVICE_UUID)).rejects.toThrow(
        'device not found',
      );

      const twice = lookup(status, [{ pub_key_digest: 'b'.repeat(64) }, { pub_key_digest: 'c'.repeat(64) }]);
      await expect(new DeviceStatusResolver(twice).resolveDeviceIdentifier(DEVICE_UUID)).rejects.toThrow(
        'multiple devices found',
      );
    });
  });
});

describe('edge helpers', () => {
  it('builds the device URL on its edge', () => {
    expect(edgeUrl({ edgeHost: 'edge-1.example.test:443', uuid: DEVICE_UUID })).toBe(
      `wss://edge-1.example.test:443/device/${DEVICE_UUID}`,
    );
  });

  it('relaxes TLS only for local edges', () => {
    expect(requiresRelaxedTls('edge:8443')).toBe(true);
    expect(requiresRelaxedTls('localhost:8443')).toBe(true);
    expect(requiresRelaxedTls('edge-1.example.test:443')).toBe(false);
  });
});
