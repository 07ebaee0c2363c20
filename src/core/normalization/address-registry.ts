import { DEX_POOLS, DEX_ROUTERS } from '../../config/constants';
import { CounterpartyTag } from '../../types/transfer';

type NamedAddress = { name: string; address: string };

function toEntries(table: Readonly<Record<string, string>>): NamedAddress[] {
  return Object.entries(table).map(([name, address]) => ({ name, address: address.toLowerCase() }));
}

/**
 * Static lookup of known DEX pools and routers. Matching is case-insensitive
 * and "first match" follows table order.
 */
export class AddressRegistry {
  private readonly pools: NamedAddress[];
  private readonly routers: NamedAddress[];

  constructor(
    pools: Readonly<Record<string, string>> = DEX_POOLS,
    routers: Readonly<Record<string, string>> = DEX_ROUTERS,
  ) {
    this.pools = toEntries(pools);
    this.routers = toEntries(routers);
  }

  private static firstMatch(entries: NamedAddress[], candidates: string[]): string | undefined {
    const lowered = candidates.filter(Boolean).map((c) => c.toLowerCase());
    return entries.find((entry) => lowered.includes(entry.address))?.name;
  }

  poolName(...addresses: string[]): string | undefined {
    return AddressRegistry.firstMatch(this.pools, addresses);
  }

  routerName(...addresses: string[]): string | undefined {
    return AddressRegistry.firstMatch(this.routers, addresses);
  }

  /** A pool on either endpoint wins over a router. */
  tagCounterparty(from: string, to: string): CounterpartyTag {
    const pool = this.poolName(from, to);
    if (pool) return `pool:${pool}`;
    const router = this.routerName(from, to);
    if (router) return `router:${router}`;
    return 'none';
  }
}

export function tagName(tag: CounterpartyTag, kind: 'pool' | 'router'): string | undefined {
  const prefix = `${kind}:`;
  return tag.startsWith(prefix) ? tag.slice(prefix.length) : undefined;
}
