import { DEFAULT_BASE_ASSET_SYMBOL, DEFAULT_REFERENCE_TOKEN } from '../../../config/constants';
import { RouterInteraction, SwapEvent, SwapStats } from '../../../types/swap';
import { TransferEvent } from '../../../types/transfer';
import { tagName } from '../../normalization/address-registry';
import { createLogger } from '../../utils/logger';

const logger = createLogger('SwapClassifier');

export interface SwapClassifierOptions {
  referenceTokenAddress?: string;
  /** Counter-asset assumed for single-leg pool swaps. */
  baseAssetSymbol?: string;
}

interface PassContext {
  transfers: readonly TransferEvent[];
  routerInteractions: readonly RouterInteraction[];
  resolved: ReadonlySet<string>;
  isReference: (event: TransferEvent) => boolean;
  baseAssetSymbol: string;
}

type SwapPass = (ctx: PassContext) => SwapEvent[];

function maxByAmount(events: TransferEvent[]): TransferEvent {
  // first wins on ties
  return events.reduce((best, event) => (event.amount > best.amount ? event : best));
}

function groupByHash(transfers: readonly TransferEvent[]): Map<string, TransferEvent[]> {
  const groups = new Map<string, TransferEvent[]>();
  for (const transfer of transfers) {
    const group = groups.get(transfer.txHash);
    if (group) group.push(transfer);
    else groups.set(transfer.txHash, [transfer]);
  }
  return groups;
}

/** One swap per transaction that moved tokens both in and out of the address. */
const multiTokenNetting: SwapPass = ({ transfers, resolved, isReference }) => {
  const swaps: SwapEvent[] = [];

  for (const [txHash, group] of groupByHash(transfers)) {
    if (!txHash || group.length < 2 || resolved.has(txHash)) continue;

    const legsIn = group.filter((t) => t.direction === 'in');
    const legsOut = group.filter((t) => t.direction === 'out');
    if (legsIn.length === 0 || legsOut.length === 0) continue;

    const primaryIn = maxByAmount(legsIn);
    const primaryOut = maxByAmount(legsOut);

    const swapType = legsOut.some(isReference) ? 'sell' : legsIn.some(isReference) ? 'buy' : 'other';

    const routed = group.find((t) => tagName(t.counterpartyTag, 'router') !== undefined);
    const router = routed ? tagName(routed.counterpartyTag, 'router') : undefined;

    const totalIn = legsIn.reduce((sum, t) => sum + t.amount, 0);
    const totalOut = legsOut.reduce((sum, t) => sum + t.amount, 0);
    logger.trace(`Netted ${txHash}: ${legsIn.length} in (${totalIn}), ${legsOut.length} out (${totalOut})`);

    swaps.push({
      timestamp: primaryOut.timestamp,
      txHash,
      swapType,
      tokenIn: primaryIn.tokenSymbol,
      tokenOut: primaryOut.tokenSymbol,
      amountIn: primaryIn.amount,
      amountOut: primaryOut.amount,
      ...(router !== undefined ? { router } : {}),
    });
  }

  return swaps;
};

/** Router calls whose token legs could not be reconstructed. */
const orphanRouterInteractions: SwapPass = ({ routerInteractions, resolved }) => {
  const seen = new Set(resolved);
  const swaps: SwapEvent[] = [];
  for (const interaction of routerInteractions) {
    if (!interaction.txHash || seen.has(interaction.txHash)) continue;
    seen.add(interaction.txHash);
    swaps.push({
      timestamp: interaction.timestamp,
      txHash: interaction.txHash,
      swapType: 'router_interaction',
      tokenIn: 'UNKNOWN',
      tokenOut: 'UNKNOWN',
      amountIn: 0,
      amountOut: 0,
      router: interaction.router,
    });
  }
  return swaps;
};

/** Single-leg transfers against a known pool, priced against the base asset. */
const poolFallback: SwapPass = ({ transfers, resolved, baseAssetSymbol }) => {
  const seen = new Set(resolved);
  const swaps: SwapEvent[] = [];
  for (const transfer of transfers) {
    const pool = tagName(transfer.counterpartyTag, 'pool');
    if (pool === undefined || !transfer.txHash || seen.has(transfer.txHash)) continue;
    seen.add(transfer.txHash);

    const inbound = transfer.direction === 'in';
    swaps.push({
      timestamp: transfer.timestamp,
      txHash: transfer.txHash,
      swapType: inbound ? 'buy' : 'sell',
      tokenIn: inbound ? transfer.tokenSymbol : baseAssetSymbol,
      tokenOut: inbound ? baseAssetSymbol : transfer.tokenSymbol,
      amountIn: inbound ? transfer.amount : 0,
      amountOut: inbound ? 0 : transfer.amount,
      pool,
    });
  }
  return swaps;
};

const PIPELINE: readonly SwapPass[] = [multiTokenNetting, orphanRouterInteractions, poolFallback];

/**
 * Runs the swap passes in order; each pass only sees hashes that earlier
 * passes left unresolved. Output is chronological, one swap per hash.
 */
export function classifySwaps(
  transfers: readonly TransferEvent[],
  routerInteractions: readonly RouterInteraction[],
  options: SwapClassifierOptions = {},
): SwapEvent[] {
  const referenceAddress = (options.referenceTokenAddress ?? DEFAULT_REFERENCE_TOKEN.address).toLowerCase();
  const isReference = (event: TransferEvent) => event.tokenAddress.toLowerCase() === referenceAddress;
  const baseAssetSymbol = options.baseAssetSymbol ?? DEFAULT_BASE_ASSET_SYMBOL;

  const resolved = new Set<string>();
  const swaps: SwapEvent[] = [];

  for (const pass of PIPELINE) {
    for (const swap of pass({ transfers, routerInteractions, resolved, isReference, baseAssetSymbol })) {
      resolved.add(swap.txHash);
      swaps.push(swap);
    }
  }

  const ordered = swaps
    .map((swap, index) => ({ swap, index }))
    .sort((a, b) => a.swap.timestamp - b.swap.timestamp || a.index - b.index)
    .map(({ swap }) => swap);

  logger.debug(
    `Classified ${ordered.length} swap(s) from ${transfers.length} transfer(s) and ${routerInteractions.length} router interaction(s)`,
  );
  return ordered;
}

export function computeSwapStats(swaps: readonly SwapEvent[], referenceSymbol: string): SwapStats {
  const count = (type: SwapEvent['swapType']) => swaps.filter((s) => s.swapType === type).length;
  const routers = new Set<string>();
  let buyVolumeReference = 0;
  let sellVolumeReference = 0;

  for (const swap of swaps) {
    if (swap.router) routers.add(swap.router);
    if (swap.swapType === 'buy' && swap.tokenIn === referenceSymbol) buyVolumeReference += swap.amountIn;
    if (swap.swapType === 'sell' && swap.tokenOut === referenceSymbol) sellVolumeReference += swap.amountOut;
  }

  return {
    totalSwaps: swaps.length,
    buyCount: count('buy'),
    sellCount: count('sell'),
    otherCount: count('other'),
    routerInteractionCount: count('router_interaction'),
    buyVolumeReference,
    sellVolumeReference,
    routersUsed: [...routers].sort(),
  };
}
