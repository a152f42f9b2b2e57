/**
 * Domain types shared by the wallet registry, snapshot store and monitoring cycle.
 */

export interface PositionEntry {
  /** Signed position size; negative for shorts. */
  size: number;
  /** Notional USD value of the position. */
  usdValue: number;
}

/** Token symbol -> position. */
export type PositionMap = Map<string, PositionEntry>;

export interface Subscriber {
  id: number;
  displayName: string;
  subscribedAt: Date;
  active: boolean;
}

export interface WalletLink {
  subscriberId: number;
  address: string;
  addedAt: Date;
  active: boolean;
}

export interface WalletSnapshot {
  address: string;
  followersCount: number;
  timestamp: Date | null;
  positions: PositionMap;
}

export interface PositionChange {
  token: string;
  previousSize: number;
  currentSize: number;
  previousUsd: number;
  currentUsd: number;
  pctChange: number;
}

export enum SubscribeOutcome {
  NEWLY_SUBSCRIBED = 'newly_subscribed',
  REACTIVATED = 'reactivated',
  ALREADY_ACTIVE = 'already_active',
}

export type AddWalletFailure = 'invalid_address' | 'duplicate' | 'not_subscribed';

export type AddWalletResult =
  | { added: true; address: string; evicted: string[] }
  | { added: false; reason: AddWalletFailure };

export interface WalletListing {
  address: string;
  addedAt: Date;
}
