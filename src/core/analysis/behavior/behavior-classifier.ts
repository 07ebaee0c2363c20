import { BRIDGE_AGGREGATOR_MARKER, SECONDS_PER_DAY } from '../../../config/constants';
import { BehaviorFeatures, BehaviorProfile, BehaviorTag } from '../../../types/behavior';
import {
  FALLBACK_TAG,
  LadderRung,
  classifyActivity,
  classifyDefi,
  classifyDiversity,
  classifyHolder,
  classifyTrader,
  classifyWhale,
} from './constants';

/**
 * Scores an address on six 0-100 axes and collects descriptive tags.
 * Tags keep ladder evaluation order; an address earning none is a casual user.
 */
export function classifyBehavior(features: BehaviorFeatures): BehaviorProfile {
  const tags: BehaviorTag[] = [];
  const take = (rung: LadderRung): number => {
    if (rung.tag) tags.push(rung.tag);
    return rung.score;
  };

  const traderScore = take(classifyTrader(features.swapCount));
  const defiScore = take(classifyDefi(features.lendingTxCount, features.routerInteractionCount));
  const holderScore = take(classifyHolder(features.balanceSeriesLength));
  if (features.currentBalance > 0) tags.push('Current Holder');
  const whaleScore = take(classifyWhale(features.currentBalance));

  const age = features.mostRecentTransferAgeSeconds;
  const daysSinceLastTransfer = age === undefined ? undefined : Math.floor(Math.max(0, age) / SECONDS_PER_DAY);
  const activityScore = take(classifyActivity(daysSinceLastTransfer));

  const diversityScore = take(classifyDiversity(features.uniqueTokenCount));

  const marker = BRIDGE_AGGREGATOR_MARKER.toLowerCase();
  if (features.routerNames.some((name) => name.toLowerCase().includes(marker))) {
    tags.push('Cross-Chain User');
  }

  return {
    scores: { traderScore, holderScore, defiScore, whaleScore, activityScore, diversityScore },
    tags: tags.length > 0 ? tags : [FALLBACK_TAG],
  };
}
