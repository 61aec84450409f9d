export interface InstanceAddress {
  host: string;
  instanceName?: string;
  port?: number;
}

/**
 * Parse host, host\instance, host,port or host\instance,port
 */
export function parseInstanceName(value: string): InstanceAddress {
  const match = value.trim().match(/^([^\\,]+)(?:\\([^,]+))?(?:,(\d+))?$/);
  if (!match) {
    throw new Error(`Invalid instance name: ${value}`);
  }

  const [, host, instanceName, port] = match;
  const address: InstanceAddress = { host: host === '.' || host === '(local)' ? 'localhost' : host };

  if (instanceName && instanceName.toUpperCase() !== 'MSSQLSERVER') {
    address.instanceName = instanceName;
  }
  if (port) {
    const portNumber = parseInt(port, 10);
    if (portNumber < 1 || portNumber > 65535) {
      throw new Error(`Invalid port number: ${portNumber}`);
    }
    address.port = portNumber;
  }
  return address;
}

function samePort(left: InstanceAddress, right: InstanceAddress): boolean {
  if (left.port !== undefined && right.port !== undefined) {
    return left.port === right.port;
  }
  // A named instance without a port is found through the browser service, on whatever port it listens
  if (left.instanceName) {
    return true;
  }
  return (left.port ?? 1433) === (right.port ?? 1433);
}

/**
 * Same instance when host, instance and port match, ignoring case and localhost aliases
 */
export function isSameInstance(a: string, b: string): boolean {
  const left = parseInstanceName(a);
  const right = parseInstanceName(b);
  return (
    left.host.toLowerCase() === right.host.toLowerCase() &&
    (left.instanceName ?? '').toLowerCase() === (right.instanceName ?? '').toLowerCase() &&
    samePort(left, right)
  );
}
