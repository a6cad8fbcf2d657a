// ─────────────────────────────────────────────
//  RemoteGateway
//  Worker-side stand-in for ActionGateway. Each call posts a
//  request to the engine and blocks on the shared signal until
//  the reply is on the port, so agents keep a synchronous API.
// ─────────────────────────────────────────────

import { receiveMessageOnPort } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';
import type { GatewayHandle, SensedObjects } from '@/engine/coordinator/ActionGateway';
import type { DirectionKey, MapData, Pos } from '@/engine/data/types/Map';
import type { Team } from '@/engine/data/types/Team';
import type { UnitArchetype, UnitInstance, UnitTypeKey } from '@/engine/data/types/Unit';
import type { BuildingArchetype, BuildingInstance, BuildingTypeKey } from '@/engine/data/types/Building';
import type { ExploreBonus } from '@/engine/state/actions/ExploreAction';
import type { GatewayCall, GatewayReply, RemoteErrorInfo } from './GatewayProtocol';
import { REPLY_PENDING } from './GatewayProtocol';
import { GameError, IllegalArgumentError } from '../utils/errors';

type GatewayMethod = keyof GatewayHandle;

function rebuildError(info: RemoteErrorInfo): GameError {
  return info.name === 'IllegalArgumentError'
    ? new IllegalArgumentError(info.message)
    : new GameError(`${info.name}: ${info.message}`);
}

export class RemoteGateway implements GatewayHandle {
  readonly #calls: MessagePort;
  readonly #signal: Int32Array;

  constructor(calls: MessagePort, signal: Int32Array) {
    this.#calls = calls;
    this.#signal = signal;
  }

  #call<M extends GatewayMethod>(method: M, args: Parameters<GatewayHandle[M]>): ReturnType<GatewayHandle[M]> {
    Atomics.store(this.#signal, 0, REPLY_PENDING);
    const call: GatewayCall = { method, args };
    this.#calls.postMessage(call);
    Atomics.wait(this.#signal, 0, REPLY_PENDING);

    const received = receiveMessageOnPort(this.#calls);
    if (!received) throw new GameError(`No reply to ${method}`);
    const reply: GatewayReply<ReturnType<GatewayHandle[M]>> = received.message;
    if (!reply.ok) throw rebuildError(reply.error);
    return reply.value;
  }

  // ── Game / team ──────────────────────────

  getTurn(): number {
    return this.#call('getTurn', []);
  }

  getAllyTeam(): Team {
    return this.#call('getAllyTeam', []);
  }

  getEnemyTeam(): Team {
    return this.#call('getEnemyTeam', []);
  }

  getBalance(team: Team): number {
    return this.#call('getBalance', [team]);
  }

  getTimeRemaining(team: Team): number {
    return this.#call('getTimeRemaining', [team]);
  }

  // ── Map ──────────────────────────────────

  getMap(): MapData {
    return this.#call('getMap', []);
  }

  getUnitPlaceableMap(): boolean[][] {
    return this.#call('getUnitPlaceableMap', []);
  }

  getBuildingPlaceableMap(): boolean[][] {
    return this.#call('getBuildingPlaceableMap', []);
  }

  newLocation(x: number, y: number, direction: DirectionKey): Pos {
    return this.#call('newLocation', [x, y, direction]);
  }

  // ── Entities ─────────────────────────────

  getUnits(team: Team): UnitInstance[] {
    return this.#call('getUnits', [team]);
  }

  getUnitIds(team: Team): number[] {
    return this.#call('getUnitIds', [team]);
  }

  getBuildings(team: Team): BuildingInstance[] {
    return this.#call('getBuildings', [team]);
  }

  getBuildingIds(team: Team): number[] {
    return this.#call('getBuildingIds', [team]);
  }

  getUnit(id: number): UnitInstance | null {
    return this.#call('getUnit', [id]);
  }

  getBuilding(id: number): BuildingInstance | null {
    return this.#call('getBuilding', [id]);
  }

  getTeamOfUnit(id: number): Team | null {
    return this.#call('getTeamOfUnit', [id]);
  }

  getTeamOfBuilding(id: number): Team | null {
    return this.#call('getTeamOfBuilding', [id]);
  }

  getUnitArchetype(type: UnitTypeKey): UnitArchetype | null {
    return this.#call('getUnitArchetype', [type]);
  }

  getBuildingArchetype(type: BuildingTypeKey): BuildingArchetype | null {
    return this.#call('getBuildingArchetype', [type]);
  }

  // ── Geometry / sensing ───────────────────

  getChebyshevDistance(x1: number, y1: number, x2: number, y2: number): number {
    return this.#call('getChebyshevDistance', [x1, y1, x2, y2]);
  }

  isWithinChebyshevRadius(x1: number, y1: number, x2: number, y2: number, radius: number): boolean {
    return this.#call('isWithinChebyshevRadius', [x1, y1, x2, y2, radius]);
  }

  senseUnitsWithinRadius(team: Team, x: number, y: number, radius: number): UnitInstance[] {
    return this.#call('senseUnitsWithinRadius', [team, x, y, radius]);
  }

  senseBuildingsWithinRadius(team: Team, x: number, y: number, radius: number): BuildingInstance[] {
    return this.#call('senseBuildingsWithinRadius', [team, x, y, radius]);
  }

  senseObjectsWithinRadius(team: Team, x: number, y: number, radius: number): SensedObjects {
    return this.#call('senseObjectsWithinRadius', [team, x, y, radius]);
  }

  senseObjectsWithinUnitRange(team: Team, unitId: number): SensedObjects {
    return this.#call('senseObjectsWithinUnitRange', [team, unitId]);
  }

  senseObjectsWithinBuildingRange(team: Team, buildingId: number): SensedObjects {
    return this.#call('senseObjectsWithinBuildingRange', [team, buildingId]);
  }

  unitPossibleMoveDirections(unitId: number): DirectionKey[] {
    return this.#call('unitPossibleMoveDirections', [unitId]);
  }

  // ── Spawning / building ──────────────────

  canSpawnUnit(type: UnitTypeKey, buildingId: number): boolean {
    return this.#call('canSpawnUnit', [type, buildingId]);
  }

  spawnUnit(type: UnitTypeKey, buildingId: number): boolean {
    return this.#call('spawnUnit', [type, buildingId]);
  }

  canBuildBuilding(type: BuildingTypeKey, x: number, y: number): boolean {
    return this.#call('canBuildBuilding', [type, x, y]);
  }

  buildBuilding(type: BuildingTypeKey, x: number, y: number): boolean {
    return this.#call('buildBuilding', [type, x, y]);
  }

  // ── Movement ─────────────────────────────

  canMoveUnitInDirection(unitId: number, direction: DirectionKey): boolean {
    return this.#call('canMoveUnitInDirection', [unitId, direction]);
  }

  moveUnitInDirection(unitId: number, direction: DirectionKey): boolean {
    return this.#call('moveUnitInDirection', [unitId, direction]);
  }

  // ── Combat ───────────────────────────────

  canUnitAttackUnit(attackerId: number, targetId: number): boolean {
    return this.#call('canUnitAttackUnit', [attackerId, targetId]);
  }

  unitAttackUnit(attackerId: number, targetId: number): boolean {
    return this.#call('unitAttackUnit', [attackerId, targetId]);
  }

  canUnitAttackBuilding(attackerId: number, buildingId: number): boolean {
    return this.#call('canUnitAttackBuilding', [attackerId, buildingId]);
  }

  unitAttackBuilding(attackerId: number, buildingId: number): boolean {
    return this.#call('unitAttackBuilding', [attackerId, buildingId]);
  }

  canUnitAttackLocation(attackerId: number, x: number, y: number): boolean {
    return this.#call('canUnitAttackLocation', [attackerId, x, y]);
  }

  unitAttackLocation(attackerId: number, x: number, y: number): boolean {
    return this.#call('unitAttackLocation', [attackerId, x, y]);
  }

  canBuildingAttackUnit(buildingId: number, targetId: number): boolean {
    return this.#call('canBuildingAttackUnit', [buildingId, targetId]);
  }

  buildingAttackUnit(buildingId: number, targetId: number): boolean {
    return this.#call('buildingAttackUnit', [buildingId, targetId]);
  }

  canBuildingAttackLocation(buildingId: number, x: number, y: number): boolean {
    return this.#call('canBuildingAttackLocation', [buildingId, x, y]);
  }

  buildingAttackLocation(buildingId: number, x: number, y: number): boolean {
    return this.#call('buildingAttackLocation', [buildingId, x, y]);
  }

  // ── Support ──────────────────────────────

  canHealUnit(healerId: number, targetId: number): boolean {
    return this.#call('canHealUnit', [healerId, targetId]);
  }

  healUnit(healerId: number, targetId: number): boolean {
    return this.#call('healUnit', [healerId, targetId]);
  }

  canBuildBridge(engineerId: number): boolean {
    return this.#call('canBuildBridge', [engineerId]);
  }

  buildBridge(engineerId: number): boolean {
    return this.#call('buildBridge', [engineerId]);
  }

  // ── Exploration ──────────────────────────

  canExplore(explorerId: number, buildingId: number, bonus: ExploreBonus = 'gold', targetId: number | null = null): boolean {
    return this.#call('canExplore', [explorerId, buildingId, bonus, targetId]);
  }

  exploreForGold(explorerId: number, buildingId: number): boolean {
    return this.#call('exploreForGold', [explorerId, buildingId]);
  }

  exploreForHealth(explorerId: number, buildingId: number, targetId: number): boolean {
    return this.#call('exploreForHealth', [explorerId, buildingId, targetId]);
  }

  exploreForAttack(explorerId: number, buildingId: number, targetId: number): boolean {
    return this.#call('exploreForAttack', [explorerId, buildingId, targetId]);
  }

  exploreForDefense(explorerId: number, buildingId: number, targetId: number): boolean {
    return this.#call('exploreForDefense', [explorerId, buildingId, targetId]);
  }

  // ── Selling / removal ────────────────────

  canSellUnit(unitId: number): boolean {
    return this.#call('canSellUnit', [unitId]);
  }

  sellUnit(unitId: number): boolean {
    return this.#call('sellUnit', [unitId]);
  }

  canSellBuilding(buildingId: number): boolean {
    return this.#call('canSellBuilding', [buildingId]);
  }

  sellBuilding(buildingId: number): boolean {
    return this.#call('sellBuilding', [buildingId]);
  }

  canDisbandUnit(unitId: number): boolean {
    return this.#call('canDisbandUnit', [unitId]);
  }

  disbandUnit(unitId: number): boolean {
    return this.#call('disbandUnit', [unitId]);
  }

  canDestroyBuilding(buildingId: number): boolean {
    return this.#call('canDestroyBuilding', [buildingId]);
  }

  destroyBuilding(buildingId: number): boolean {
    return this.#call('destroyBuilding', [buildingId]);
  }
}
