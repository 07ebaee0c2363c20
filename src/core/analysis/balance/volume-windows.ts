import { VolumeWindow } from '../../../types/balance';
import { TransferEvent } from '../../../types/transfer';

/** In/out volume of events strictly newer than `now - hours`. */
export function computeVolumeWindow(events: readonly TransferEvent[], hours: number, now: number): VolumeWindow {
  const cutoff = now - hours * 3600;
  let inVolume = 0;
  let outVolume = 0;
  let txCount = 0;

  for (const event of events) {
    if (event.timestamp <= cutoff) continue;
    txCount += 1;
    if (event.direction === 'in') inVolume += event.amount;
    else if (event.direction === 'out') outVolume += event.amount;
  }

  return { inVolume, outVolume, totalVolume: inVolume + outVolume, txCount, hours };
}
