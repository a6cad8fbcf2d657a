// ─────────────────────────────────────────────
//  Public API
// ─────────────────────────────────────────────

export { GAME_CONSTANTS, resolveGameConfig } from './config';
export type { GameConfig } from './config';

export { TEAMS, FIRST_MOVER, SECOND_MOVER, opposingTeam } from './engine/data/types/Team';
export type { Team } from './engine/data/types/Team';
export { DIRECTIONS, DIRECTION_KEYS } from './engine/data/types/Map';
export type { DirectionKey, MapData, Pos } from './engine/data/types/Map';
export type { TerrainKey } from './engine/data/types/Terrain';
export type { UnitArchetype, UnitInstance, UnitTypeKey } from './engine/data/types/Unit';
export type { BuildingArchetype, BuildingInstance, BuildingTypeKey } from './engine/data/types/Building';
export { Archetypes } from './engine/loader/ArchetypeLoader';

export { createWorldMap } from './engine/systems/map/WorldMap';
export type { WorldMapInput } from './engine/systems/map/WorldMap';

export { GameCoordinator } from './engine/coordinator/GameCoordinator';
export type { GameOptions } from './engine/coordinator/GameCoordinator';
export { ActionGateway } from './engine/coordinator/ActionGateway';
export type { GatewayHandle, SensedObjects } from './engine/coordinator/ActionGateway';
export type { Agent, AgentFactory, AgentModule, AgentSource } from './engine/agent/Agent';
export { WorkerAgent } from './engine/agent/WorkerAgent';
export { InProcessAgentRunner } from './engine/agent/AgentRunner';
export type { AgentRunner, AgentTurnResult, AgentTurnStatus } from './engine/agent/AgentRunner';
export type { ExploreBonus } from './engine/state/actions/ExploreAction';

export type { GameResult, GameOverReason } from './engine/systems/turn/TurnScheduler';
export type { WinRule } from './engine/systems/stage/WinDeterminer';
export { ReplayRecorder } from './engine/systems/replay/ReplayRecorder';
export type { ReplayDocument, TurnRecord, WorldSnapshot } from './engine/systems/replay/ReplayRecorder';

export { EventBus } from './engine/utils/EventBus';
export type { GameEventMap } from './engine/utils/EventBus';
export { Logger } from './engine/utils/Logger';
export { AgentFault, GameError, IllegalArgumentError } from './engine/utils/errors';
