/**
 * Device identities registered with the simulator.
 *
 * The simulator only reads `name` (graph node id) and `kind` (reporting).
 * It keeps references to devices but never owns them: callers decide
 * when a device goes away.
 */

export interface Device {
  readonly name: string;
  readonly kind: string;
}

export interface RouterDevice extends Device {
  readonly kind: 'Router';
  readonly id: number;
  readonly mgmtInterface: string;
}

export interface SwitchDevice extends Device {
  readonly kind: 'Switch';
  readonly id: number;
  readonly mgmtInterface: string;
}

export interface HostDevice extends Device {
  readonly kind: 'Host';
  readonly id: number;
  readonly ipAddress: string;
}

/** Managed forwarding equipment. Hosts are not network devices. */
export type NetworkDevice = RouterDevice | SwitchDevice;

export function createRouter(id: number, name: string, mgmtInterface: string = ''): RouterDevice {
  return { kind: 'Router', id, name, mgmtInterface };
}

export function createSwitch(id: number, name: string, mgmtInterface: string = ''): SwitchDevice {
  return { kind: 'Switch', id, name, mgmtInterface };
}

export function createHost(id: number, name: string, ipAddress: string): HostDevice {
  return { kind: 'Host', id, name, ipAddress };
}

export function isNetworkDevice(device: Device): device is NetworkDevice {
  return device.kind === 'Router' || device.kind === 'Switch';
}
