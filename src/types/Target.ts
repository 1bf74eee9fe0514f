/** Transport protocol of a forwarded port */
export type TargetProtocol = 'tcp' | 'udp';

/** Local port sentinel that forwards process stdin/stdout instead of a socket */
export const STDIO_PORT = 'stdio';

/** A parsed forwarding target: `[localHost:]localPort:remoteHost:remotePort[/udp]` */
export interface TargetDescriptor {
  protocol: TargetProtocol;
  localHost: string;
  localPort: number | typeof STDIO_PORT;
  remoteHost: string;
  remotePort: number;
}

/** A raw connection request for one device, targets not yet parsed */
export interface DeviceConnection {
  deviceId: string;
  targets: string[];
}

/** Address a target was actually bound to (port 0 resolves to an ephemeral port) */
export interface BoundTarget {
  target: TargetDescriptor;
  localAddress: string;
  localPort: number;
}
