/** Version of the edge gateway a device is connected to */
export const EdgeVersion = {
  /** Legacy VPN-index based edge */
  Legacy: 0,
  /** Native remote access edge */
  Native: 1,
} as const;

export type EdgeVersion = (typeof EdgeVersion)[keyof typeof EdgeVersion];

/** Device status as returned by the management API */
export interface DeviceStatus {
  uuid: string;
  remote_access: boolean;
  /** `<edge-host>:<edge-port>/edge/<edge-id>`, only set when remote access is enabled */
  edge?: string;
  edge_version?: number;
}

/** Device whose remote access has been confirmed */
export interface ResolvedDevice {
  deviceId: string;
  uuid: string;
  edgeHost: string;
  edgeVersion: EdgeVersion;
}

/** Search filter of the inventory list endpoint */
export interface InventorySearch {
  node_id?: string;
  uuid?: string;
  title?: string;
}

export interface InventoryItem {
  pub_key_digest: string;
  uuid?: string;
  title?: string;
}

export interface InventoryListResponse {
  items: InventoryItem[];
  total: number;
}
