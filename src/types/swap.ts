export type SwapType = 'buy' | 'sell' | 'other' | 'router_interaction';

export interface SwapEvent {
  timestamp: number;
  txHash: string;
  swapType: SwapType;
  tokenIn: string;
  tokenOut: string;
  amountIn: number;
  amountOut: number;
  router?: string;
  pool?: string;
}

export interface RouterInteraction {
  txHash: string;
  router: string;
  method: string;
  timestamp: number;
}

export interface SwapStats {
  totalSwaps: number;
  buyCount: number;
  sellCount: number;
  otherCount: number;
  routerInteractionCount: number;
  buyVolumeReference: number;   // amountIn of buys paid in the reference token
  sellVolumeReference: number;  // amountOut of sells received in the reference token
  routersUsed: string[];
}
