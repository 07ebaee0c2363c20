import { ROUTER_NAME_HINTS } from '../../config/constants';
import { RouterInteraction } from '../../types/swap';
import { AddressTransaction } from '../../types/transaction';
import { AddressRegistry } from './address-registry';

function looksLikeRouter(contractName: string): boolean {
  const lowered = contractName.toLowerCase();
  return ROUTER_NAME_HINTS.some((hint) => lowered.includes(hint));
}

/**
 * Finds transactions sent to a swap-capable contract: a registered router
 * first, otherwise any contract whose verified name hints at routing.
 * At most one interaction per hash.
 */
export function detectRouterInteractions(
  transactions: AddressTransaction[],
  registry: AddressRegistry,
): RouterInteraction[] {
  const seen = new Set<string>();
  const interactions: RouterInteraction[] = [];

  for (const tx of transactions) {
    if (!tx.hash || seen.has(tx.hash)) continue;

    const router =
      registry.routerName(tx.to) ?? (tx.contractName && looksLikeRouter(tx.contractName) ? tx.contractName : undefined);
    if (!router) continue;

    seen.add(tx.hash);
    interactions.push({ txHash: tx.hash, router, method: tx.method, timestamp: tx.timestamp });
  }

  return interactions;
}
