// ─────────────────────────────────────────────
//  Action Gateway
//  The only object an agent receives. Bound to one team; every
//  mutator is paired with a predicate that runs the same checks.
//  Rule violations come back as `false`, never as exceptions.
//  Queries return copies so agents cannot reach live state.
// ─────────────────────────────────────────────

import type { WorldStore } from '@/engine/state/WorldStore';
import type { GameAction } from '@/engine/state/GameAction';
import type { WorldState } from '@/engine/state/WorldState';
import type { DirectionKey, MapData, Pos } from '@/engine/data/types/Map';
import type { Team } from '@/engine/data/types/Team';
import type { UnitArchetype, UnitInstance, UnitTypeKey } from '@/engine/data/types/Unit';
import type { BuildingArchetype, BuildingInstance, BuildingTypeKey } from '@/engine/data/types/Building';
import type { ExploreBonus } from '@/engine/state/actions/ExploreAction';
import { DIRECTION_KEYS, isDirectionKey } from '@/engine/data/types/Map';
import { opposingTeam } from '@/engine/data/types/Team';
import { StateQuery } from '@/engine/state/WorldState';
import { SpawnUnitAction } from '@/engine/state/actions/SpawnUnitAction';
import { BuildBuildingAction } from '@/engine/state/actions/BuildBuildingAction';
import { MoveUnitAction, stepFrom } from '@/engine/state/actions/MoveUnitAction';
import { UnitAttackAction } from '@/engine/state/actions/UnitAttackAction';
import { BuildingAttackAction } from '@/engine/state/actions/BuildingAttackAction';
import { HealUnitAction } from '@/engine/state/actions/HealUnitAction';
import { BuildBridgeAction } from '@/engine/state/actions/BuildBridgeAction';
import { ExploreAction } from '@/engine/state/actions/ExploreAction';
import { SellAction } from '@/engine/state/actions/SellAction';
import { RemoveAction } from '@/engine/state/actions/RemoveAction';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { MathUtils } from '@/engine/utils/MathUtils';
import { IllegalArgumentError } from '@/engine/utils/errors';

/** The public surface of a gateway, as seen by agents in-process or across a worker boundary */
export type GatewayHandle = Pick<ActionGateway, keyof ActionGateway>;

export interface SensedObjects {
  units: UnitInstance[];
  buildings: BuildingInstance[];
}

function requireRadius(radius: number): void {
  if (!(radius >= 0)) throw new IllegalArgumentError(`Radius must be non-negative (got ${radius})`);
}

export class ActionGateway {
  // ES private members: agents are untrusted and must not reach the store at runtime.
  readonly #store: WorldStore;
  readonly #team: Team;

  constructor(store: WorldStore, team: Team) {
    this.#store = store;
    this.#team = team;
  }

  get #state(): WorldState {
    return this.#store.getState();
  }

  #can(action: GameAction): boolean {
    return this.#store.canDispatch(action);
  }

  #run(action: GameAction): boolean {
    return this.#store.dispatch(action);
  }

  // ── Game / team ──────────────────────────

  getTurn(): number {
    return this.#state.turn;
  }

  getAllyTeam(): Team {
    return this.#team;
  }

  getEnemyTeam(): Team {
    return opposingTeam(this.#team);
  }

  getBalance(team: Team): number {
    return this.#state.balance[team];
  }

  /** Seconds of turn time left in the team's pool */
  getTimeRemaining(team: Team): number {
    return this.#state.timeRemaining[team];
  }

  // ── Map ──────────────────────────────────

  getMap(): MapData {
    return structuredClone(this.#state.map);
  }

  /** [y][x]: true where no unit stands */
  getUnitPlaceableMap(): boolean[][] {
    return structuredClone(this.#state.unitFree);
  }

  /** [y][x]: true where no building stands */
  getBuildingPlaceableMap(): boolean[][] {
    return structuredClone(this.#state.buildingFree);
  }

  newLocation(x: number, y: number, direction: DirectionKey): Pos {
    if (!isDirectionKey(direction)) throw new IllegalArgumentError(`Unknown direction "${String(direction)}"`);
    return stepFrom({ x, y }, direction);
  }

  // ── Entities ─────────────────────────────

  getUnits(team: Team): UnitInstance[] {
    return structuredClone(StateQuery.unitsOf(this.#state, team));
  }

  getUnitIds(team: Team): number[] {
    return StateQuery.unitsOf(this.#state, team).map(u => u.id);
  }

  getBuildings(team: Team): BuildingInstance[] {
    return structuredClone(StateQuery.buildingsOf(this.#state, team));
  }

  getBuildingIds(team: Team): number[] {
    return StateQuery.buildingsOf(this.#state, team).map(b => b.id);
  }

  getUnit(id: number): UnitInstance | null {
    const unit = StateQuery.unit(this.#state, id);
    return unit ? structuredClone(unit) : null;
  }

  getBuilding(id: number): BuildingInstance | null {
    const building = StateQuery.building(this.#state, id);
    return building ? structuredClone(building) : null;
  }

  getTeamOfUnit(id: number): Team | null {
    return StateQuery.teamOfUnit(this.#state, id) ?? null;
  }

  getTeamOfBuilding(id: number): Team | null {
    return StateQuery.teamOfBuilding(this.#state, id) ?? null;
  }

  getUnitArchetype(type: UnitTypeKey): UnitArchetype | null {
    const archetype = Archetypes.findUnit(type);
    return archetype ? structuredClone(archetype) : null;
  }

  getBuildingArchetype(type: BuildingTypeKey): BuildingArchetype | null {
    const archetype = Archetypes.findBuilding(type);
    return archetype ? structuredClone(archetype) : null;
  }

  // ── Geometry / sensing ───────────────────

  getChebyshevDistance(x1: number, y1: number, x2: number, y2: number): number {
    return MathUtils.chebyshev({ x: x1, y: y1 }, { x: x2, y: y2 });
  }

  isWithinChebyshevRadius(x1: number, y1: number, x2: number, y2: number, radius: number): boolean {
    requireRadius(radius);
    return MathUtils.withinRadius({ x: x1, y: y1 }, { x: x2, y: y2 }, radius);
  }

  /** The team's units within the radius, in ascending id order */
  senseUnitsWithinRadius(team: Team, x: number, y: number, radius: number): UnitInstance[] {
    requireRadius(radius);
    const units = StateQuery.unitsOf(this.#state, team)
      .filter(u => MathUtils.chebyshev(u, { x, y }) <= radius)
      .sort((a, b) => a.id - b.id);
    return structuredClone(units);
  }

  senseBuildingsWithinRadius(team: Team, x: number, y: number, radius: number): BuildingInstance[] {
    requireRadius(radius);
    const buildings = StateQuery.buildingsOf(this.#state, team)
      .filter(b => MathUtils.chebyshev(b, { x, y }) <= radius)
      .sort((a, b) => a.id - b.id);
    return structuredClone(buildings);
  }

  senseObjectsWithinRadius(team: Team, x: number, y: number, radius: number): SensedObjects {
    return {
      units: this.senseUnitsWithinRadius(team, x, y, radius),
      buildings: this.senseBuildingsWithinRadius(team, x, y, radius),
    };
  }

  /** The team's objects within attack range of one of its own units; empty for an unknown id */
  senseObjectsWithinUnitRange(team: Team, unitId: number): SensedObjects {
    const unit = this.#state.units[team][unitId];
    if (!unit) return { units: [], buildings: [] };
    return this.senseObjectsWithinRadius(team, unit.x, unit.y, unit.attackRange);
  }

  senseObjectsWithinBuildingRange(team: Team, buildingId: number): SensedObjects {
    const building = this.#state.buildings[team][buildingId];
    if (!building) return { units: [], buildings: [] };
    return this.senseObjectsWithinRadius(team, building.x, building.y, building.attackRange);
  }

  /** Directions (STAY included) the unit could legally take right now */
  unitPossibleMoveDirections(unitId: number): DirectionKey[] {
    return DIRECTION_KEYS.filter(direction => this.canMoveUnitInDirection(unitId, direction));
  }

  // ── Spawning / building ──────────────────

  canSpawnUnit(type: UnitTypeKey, buildingId: number): boolean {
    return this.#can(new SpawnUnitAction(this.#team, type, buildingId));
  }

  spawnUnit(type: UnitTypeKey, buildingId: number): boolean {
    return this.#run(new SpawnUnitAction(this.#team, type, buildingId));
  }

  canBuildBuilding(type: BuildingTypeKey, x: number, y: number): boolean {
    return this.#can(new BuildBuildingAction(this.#team, type, x, y));
  }

  buildBuilding(type: BuildingTypeKey, x: number, y: number): boolean {
    return this.#run(new BuildBuildingAction(this.#team, type, x, y));
  }

  // ── Movement ─────────────────────────────

  canMoveUnitInDirection(unitId: number, direction: DirectionKey): boolean {
    return this.#can(new MoveUnitAction(this.#team, unitId, direction));
  }

  moveUnitInDirection(unitId: number, direction: DirectionKey): boolean {
    return this.#run(new MoveUnitAction(this.#team, unitId, direction));
  }

  // ── Combat ───────────────────────────────

  canUnitAttackUnit(attackerId: number, targetId: number): boolean {
    return this.#can(new UnitAttackAction(this.#team, attackerId, { kind: 'unit', id: targetId }));
  }

  unitAttackUnit(attackerId: number, targetId: number): boolean {
    return this.#run(new UnitAttackAction(this.#team, attackerId, { kind: 'unit', id: targetId }));
  }

  canUnitAttackBuilding(attackerId: number, buildingId: number): boolean {
    return this.#can(new UnitAttackAction(this.#team, attackerId, { kind: 'building', id: buildingId }));
  }

  unitAttackBuilding(attackerId: number, buildingId: number): boolean {
    return this.#run(new UnitAttackAction(this.#team, attackerId, { kind: 'building', id: buildingId }));
  }

  canUnitAttackLocation(attackerId: number, x: number, y: number): boolean {
    return this.#can(new UnitAttackAction(this.#team, attackerId, { kind: 'location', x, y }));
  }

  unitAttackLocation(attackerId: number, x: number, y: number): boolean {
    return this.#run(new UnitAttackAction(this.#team, attackerId, { kind: 'location', x, y }));
  }

  canBuildingAttackUnit(buildingId: number, targetId: number): boolean {
    return this.#can(new BuildingAttackAction(this.#team, buildingId, { kind: 'unit', id: targetId }));
  }

  buildingAttackUnit(buildingId: number, targetId: number): boolean {
    return this.#run(new BuildingAttackAction(this.#team, buildingId, { kind: 'unit', id: targetId }));
  }

  canBuildingAttackLocation(buildingId: number, x: number, y: number): boolean {
    return this.#can(new BuildingAttackAction(this.#team, buildingId, { kind: 'location', x, y }));
  }

  buildingAttackLocation(buildingId: number, x: number, y: number): boolean {
    return this.#run(new BuildingAttackAction(this.#team, buildingId, { kind: 'location', x, y }));
  }

  // ── Support ──────────────────────────────

  canHealUnit(healerId: number, targetId: number): boolean {
    return this.#can(new HealUnitAction(this.#team, healerId, targetId));
  }

  healUnit(healerId: number, targetId: number): boolean {
    return this.#run(new HealUnitAction(this.#team, healerId, targetId));
  }

  canBuildBridge(engineerId: number): boolean {
    return this.#can(new BuildBridgeAction(this.#team, engineerId));
  }

  buildBridge(engineerId: number): boolean {
    return this.#run(new BuildBridgeAction(this.#team, engineerId));
  }

  // ── Exploration ──────────────────────────

  /** Explorer and exploration building share a tile; `targetId` is needed for unit bonuses. */
  canExplore(explorerId: number, buildingId: number, bonus: ExploreBonus = 'gold', targetId: number | null = null): boolean {
    return this.#can(new ExploreAction(this.#team, explorerId, buildingId, bonus, targetId));
  }

  exploreForGold(explorerId: number, buildingId: number): boolean {
    return this.#run(new ExploreAction(this.#team, explorerId, buildingId, 'gold'));
  }

  exploreForHealth(explorerId: number, buildingId: number, targetId: number): boolean {
    return this.#run(new ExploreAction(this.#team, explorerId, buildingId, 'health', targetId));
  }

  exploreForAttack(explorerId: number, buildingId: number, targetId: number): boolean {
    return this.#run(new ExploreAction(this.#team, explorerId, buildingId, 'attack', targetId));
  }

  exploreForDefense(explorerId: number, buildingId: number, targetId: number): boolean {
    return this.#run(new ExploreAction(this.#team, explorerId, buildingId, 'defense', targetId));
  }

  // ── Selling / removal ────────────────────

  canSellUnit(unitId: number): boolean {
    return this.#can(new SellAction(this.#team, 'unit', unitId));
  }

  sellUnit(unitId: number): boolean {
    return this.#run(new SellAction(this.#team, 'unit', unitId));
  }

  canSellBuilding(buildingId: number): boolean {
    return this.#can(new SellAction(this.#team, 'building', buildingId));
  }

  sellBuilding(buildingId: number): boolean {
    return this.#run(new SellAction(this.#team, 'building', buildingId));
  }

  canDisbandUnit(unitId: number): boolean {
    return this.#can(new RemoveAction(this.#team, 'unit', unitId));
  }

  disbandUnit(unitId: number): boolean {
    return this.#run(new RemoveAction(this.#team, 'unit', unitId));
  }

  canDestroyBuilding(buildingId: number): boolean {
    return this.#can(new RemoveAction(this.#team, 'building', buildingId));
  }

  destroyBuilding(buildingId: number): boolean {
    return this.#run(new RemoveAction(this.#team, 'building', buildingId));
  }
}
