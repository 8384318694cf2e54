// ─────────────────────────────────────────────
//  Combat System: hit-chance matchups + exchange loop
//  Pure functions: randomness comes in through the Prng argument.
// ─────────────────────────────────────────────

import type { UnitType } from '@/engine/data/types/Unit';
import type { Prng } from '@/engine/utils/Prng';
import { invariant } from '@/engine/utils/errors';
import { ATTACK_DAMAGE, CITY_DEFENSE_BONUS, DEFENSE_DAMAGE } from '@/config';

export interface HitChances {
  attacker: number;
  defender: number;
}

export interface CombatOutcome {
  attackerHp: number;
  defenderHp: number;
  attackerAlive: boolean;
  defenderAlive: boolean;
  rounds: number;
}

export const MATCHUPS = {
  fighterVsArmy:  { attacker: 0.65, defender: 0.35 },
  fighterVsOther: { attacker: 0.50, defender: 0.50 },
  standard:       { attacker: 0.55, defender: 0.50 },
} as const satisfies Record<string, HitChances>;

const round2 = (v: number): number => Math.round(v * 100) / 100;
const unit = (v: number): number => Math.max(0, Math.min(1, v));

export function baseHitChances(attacker: UnitType, defender: UnitType): HitChances {
  if (attacker === 'Fighter') {
    return defender === 'Army' ? MATCHUPS.fighterVsArmy : MATCHUPS.fighterVsOther;
  }
  return MATCHUPS.standard;
}

/** Matchup chances with the city swing applied when the defender holds its own city */
export function effectiveHitChances(
  attacker: UnitType,
  defender: UnitType,
  defenderHoldsCity: boolean,
): HitChances {
  const base = baseHitChances(attacker, defender);
  if (!defenderHoldsCity) return { attacker: base.attacker, defender: base.defender };
  return {
    attacker: round2(unit(base.attacker - CITY_DEFENSE_BONUS)),
    defender: round2(unit(base.defender + CITY_DEFENSE_BONUS)),
  };
}

/**
 * Exchange blows until one side drops. Each round the attacker swings first;
 * the defender only answers if it is still standing. The loser ends at hp 0.
 */
export function resolveCombat(
  attackerHp: number,
  defenderHp: number,
  chances: HitChances,
  prng: Prng,
): CombatOutcome {
  invariant(attackerHp > 0 && defenderHp > 0, 'combat needs two live units');
  invariant(chances.attacker > 0 || chances.defender > 0, 'combat needs a positive hit chance');

  let att = attackerHp;
  let def = defenderHp;
  let rounds = 0;

  while (att > 0 && def > 0) {
    rounds++;
    if (prng.next() < chances.attacker) def -= ATTACK_DAMAGE;
    if (def <= 0) break;
    if (prng.next() < chances.defender) att -= DEFENSE_DAMAGE;
  }

  const attackerAlive = att > 0;
  const defenderAlive = def > 0;

  return {
    attackerHp: attackerAlive ? att : 0,
    defenderHp: defenderAlive ? def : 0,
    attackerAlive,
    defenderAlive,
    rounds,
  };
}
