import { networkInterfaces } from 'node:os';
import type { NetworkInterfaceInfo } from 'node:os';

type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

/**
 * Addresses that count as "ours" when splitting traffic into inbound and
 * outbound. `any` takes every interface, loopback included, since tshark
 * captures on all of them.
 */
export function resolveLocalAddresses(
  interfaceName: string,
  override: readonly string[] | null = null,
  table: InterfaceTable = networkInterfaces(),
): string[] {
  if (override !== null) return [...override];

  const names = interfaceName === 'any' ? Object.keys(table) : [interfaceName];
  const addresses = new Set<string>();
  for (const name of names) {
    for (const info of table[name] ?? []) {
      addresses.add(info.address);
    }
  }
  return [...addresses];
}
