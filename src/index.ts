// Public surface of the engine. UIs drive a GameStore and read glyph rows.

export { GameStore } from '@/engine/state/GameStore';
export type { GameState, PlayerFog } from '@/engine/state/GameState';
export { StateQuery } from '@/engine/state/GameState';
export { createInitialState, findCentralLand } from '@/engine/state/GameSetup';
export type {
  ActionContext,
  ActionExecution,
  CommandResult,
  DetonationReport,
  DetonationResult,
  EndTurnResult,
  GameAction,
  MoveResult,
} from '@/engine/state/actions/GameAction';
export { MoveAction } from '@/engine/state/actions/MoveAction';
export { SetProductionAction, CycleProductionAction } from '@/engine/state/actions/SetProductionAction';
export { FoundCityAction } from '@/engine/state/actions/FoundCityAction';
export { DetonateAction } from '@/engine/state/actions/DetonateAction';
export { EndTurnAction } from '@/engine/state/actions/EndTurnAction';

export * from '@/config';
export type { Pos, Terrain, TileGrid, MapData, Viewport, Direction } from '@/engine/data/types/Map';
export type { UnitType, UnitData, UnitInstance, MissileFlight } from '@/engine/data/types/Unit';
export type { CityState } from '@/engine/data/types/City';
export type { PlayerId, PlayerData, PlayerStats, BattleReport, Telemetry } from '@/engine/data/types/Player';
export { UNIT_CATALOG, PRODUCTION_ORDER, unitData, isUnitType } from '@/engine/data/UnitCatalog';

export { generateTerrain, findLandComponents } from '@/engine/systems/terrain/TerrainGenerator';
export { placeCities } from '@/engine/systems/terrain/CityPlacement';
export { recomputeVisibility, isVisible, isExplored } from '@/engine/systems/visibility/VisibilitySystem';
export { renderSnapshot } from '@/engine/systems/render/RenderSystem';
export { effectiveHitChances, resolveCombat } from '@/engine/systems/combat/CombatSystem';
export { detonateMissile } from '@/engine/systems/missile/MissileSystem';
export type { TurnPhase } from '@/engine/systems/turn/TurnManager';
export { createSnapshot, restoreState, serialize, deserialize } from '@/engine/systems/save/SaveManager';
export type { GameSnapshot } from '@/engine/systems/save/SnapshotSchema';

export { TypedEventBus } from '@/engine/utils/EventBus';
export type { GameEventMap, DestroyCause } from '@/engine/utils/EventBus';
export { Logger } from '@/engine/utils/Logger';
export type { LogClass } from '@/engine/utils/Logger';
export { ConfigError, SnapshotError, InvariantError } from '@/engine/utils/errors';
export { createPrng } from '@/engine/utils/Prng';
export type { Prng } from '@/engine/utils/Prng';
