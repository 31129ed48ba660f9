import { Goal, HypothesisBody, MarketContext, UserProfile } from '../../types.js';

export interface HypothesisInput {
  profile: UserProfile;
  goal: Goal;
  context: MarketContext;
}

/**
 * A strategy family turns a profile, goal and market snapshot into a
 * hypothesis, or returns null when the snapshot gives it nothing to work with.
 */
export interface StrategyFamilyPlugin {
  id: string;
  name: string;
  description: string;
  build(input: HypothesisInput): HypothesisBody | null;
}
