import type { Point } from '../types/map';

export type EntityId = number;

export type PortErrorCode = 'UNAVAILABLE' | 'INVALID_TARGET' | 'REJECTED';

export interface PortError {
  code: PortErrorCode;
  message: string;
}

export type PortResult<T> = { ok: true; value: T } | { ok: false; error: PortError };

export function portOk<T>(value: T): PortResult<T> {
  return { ok: true, value };
}

export function portError<T>(code: PortErrorCode, message: string): PortResult<T> {
  return { ok: false, error: { code, message } };
}

export interface HostileContact {
  id: EntityId;
  position: Point;
  alive: boolean;
}

/** Motion driver: follows one point at a time and reports arrival. */
export interface MovementPort {
  moveTo(point: Point): PortResult<void>;
  isFollowing(): boolean;
  arrived: boolean;
  stop(): void; // cancel the current follow, keep `arrived`
  reset(): void;
  pause(): void;
  resume(): void;
}

export interface SensingPort {
  nearbyHostiles(position: Point, radius: number): PortResult<HostileContact[]>;
  getHostile(id: EntityId): PortResult<HostileContact | null>;
}

/** Direct player commands used while engaging. */
export interface ActionPort {
  changeTarget(id: EntityId): PortResult<void>;
  move(point: Point): PortResult<void>;
}

/** Zone transitions and player state the mission flow waits on. */
export interface WorldPort {
  playerPosition(): Point;
  currentLocationId(): number;
  travelTo(locationId: number): void;
  isLoading(): boolean;
  isExplorable(): boolean;
  inDanger(): boolean;
  hasBuff(): boolean;
  buffAvailable(): boolean;
  requestBuff(): void;
}
