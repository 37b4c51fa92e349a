import { LoyaltyTier } from './models.js';

export function loyaltyTierFor(points: number): LoyaltyTier {
  if (points >= 5000) return 'Platinum';
  if (points >= 1000) return 'Gold';
  if (points >= 500) return 'Silver';
  return 'Standard';
}
