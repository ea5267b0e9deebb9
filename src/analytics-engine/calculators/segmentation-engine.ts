import { CONSTANTS, TierName } from '../../config/constants';
import type { CustomerSpendProfile, SegmentationResult, Transaction, ValueTier } from '../../types';
import { quantileSorted, roundTo, sortAscending, sum } from '../../utils/statistics';
import { buildSpendProfiles, renderSpendProfile } from './spend-profiles';

export interface SegmentationOptions {
  topLimit: number;
}

export interface TierBounds {
  segment: TierName;
  lowerBound: number;
  upperBound: number | null;
}

/**
 * Cut points for each named tier. Tiers are listed highest first and each
 * tier's upper bound is the lower bound of the tier above it.
 */
export function computeTierBounds(sortedSpend: readonly number[]): TierBounds[] {
  let upperBound: number | null = null;

  return CONSTANTS.SEGMENTATION.TIERS.map((tier) => {
    const lowerBound = quantileSorted(sortedSpend, tier.percentile);
    const bounds: TierBounds = { segment: tier.name, lowerBound, upperBound };
    upperBound = lowerBound;
    return bounds;
  });
}

function inTier(spend: number, bounds: TierBounds): boolean {
  if (spend < bounds.lowerBound) return false;
  return bounds.upperBound === null || spend < bounds.upperBound;
}

function summarizeTier(
  bounds: TierBounds,
  members: readonly CustomerSpendProfile[],
  profiledCustomers: number
): ValueTier {
  const spend = members.map((p) => p.totalSpent);
  const total = sum(spend);
  // Tiers can hold hundreds of thousands of members, too many to spread as arguments
  let minSpend = spend[0];
  let maxSpend = spend[0];
  for (const value of spend) {
    if (value < minSpend) minSpend = value;
    if (value > maxSpend) maxSpend = value;
  }

  return {
    segment: bounds.segment,
    customerCount: members.length,
    avgRevenue: roundTo(total / members.length),
    totalRevenue: roundTo(total),
    minSpend,
    maxSpend,
    percentage: roundTo((members.length / profiledCustomers) * 100),
    lowerBound: roundTo(bounds.lowerBound),
    upperBound: bounds.upperBound === null ? null : roundTo(bounds.upperBound),
  };
}

export function segmentProfiles(
  profiles: readonly CustomerSpendProfile[],
  options: SegmentationOptions
): SegmentationResult {
  if (profiles.length === 0) {
    return {
      highValueThreshold: 0,
      totalHighValueCustomers: 0,
      profiledCustomers: 0,
      customerSegments: [],
      topCustomers: [],
    };
  }

  const sortedSpend = sortAscending(profiles.map((p) => p.totalSpent));
  const threshold = quantileSorted(sortedSpend, CONSTANTS.SEGMENTATION.HIGH_VALUE_PERCENTILE);

  const highValue = profiles.filter((p) => p.totalSpent >= threshold);
  // Array.prototype.sort is stable, so equal spend keeps profile order
  const topCustomers = [...highValue]
    .sort((a, b) => b.totalSpent - a.totalSpent)
    .slice(0, options.topLimit)
    .map(renderSpendProfile);

  const customerSegments = computeTierBounds(sortedSpend)
    .map((bounds) => ({ bounds, members: profiles.filter((p) => inTier(p.totalSpent, bounds)) }))
    .filter(({ members }) => members.length > 0)
    .map(({ bounds, members }) => summarizeTier(bounds, members, profiles.length));

  return {
    highValueThreshold: roundTo(threshold),
    totalHighValueCustomers: highValue.length,
    profiledCustomers: profiles.length,
    customerSegments,
    topCustomers,
  };
}

export function calculateCustomerSegments(
  transactions: readonly Transaction[],
  options: SegmentationOptions
): SegmentationResult {
  return segmentProfiles(buildSpendProfiles(transactions), options);
}
