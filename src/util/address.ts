/**
 * `host:port` listen addresses as written on the command line:
 * ":9122", "0.0.0.0:9122", "localhost:9122", "[::1]:9122".
 * An empty host means all interfaces.
 */

export interface HostPort {
  host: string | undefined;
  port: number;
}

export function parseHostPort(address: string): HostPort {
  const idx = address.lastIndexOf(':');
  if (idx < 0) throw new Error(`address ${address}: missing port`);

  let host = address.slice(0, idx);
  const portText = address.slice(idx + 1);

  if (host.startsWith('[')) {
    if (!host.endsWith(']')) throw new Error(`address ${address}: missing ']'`);
    host = host.slice(1, -1);
  } else if (host.includes(':')) {
    throw new Error(`address ${address}: too many colons`);
  }

  if (!/^\d+$/.test(portText)) throw new Error(`address ${address}: invalid port`);
  const port = Number(portText);
  if (port > 65535) throw new Error(`address ${address}: invalid port`);

  return { host: host.length > 0 ? host : undefined, port };
}
