// ─────────────────────────────────────────────
//  City Types
// ─────────────────────────────────────────────

import type { PlayerId } from './Player';
import type { UnitType } from './Unit';

export interface CityState {
  readonly x: number;
  readonly y: number;
  /** null = neutral */
  owner: PlayerId | null;
  production: UnitType | null;
  /** Counts up by one per turn; held at `cost` while a spawn is blocked */
  progress: number;
  /** Threshold for the current production target */
  cost: number;
  /** Max alive Armies whose home is this city */
  supportCap: number;
}
