/**
 * Shared primitive types for recording and replay
 * 录制与回放的共享基础类型
 */

/**
 * Stable id an entity carried when it was observed during recording (uint16)
 * 录制时实体的稳定网络ID（uint16）
 */
export type NetId = number;

/**
 * Id the host simulation assigns to a live entity; changes between sessions
 * 宿主模拟分配给存活实体的ID，不同会话之间会变化
 */
export type SimId = number;

/**
 * Two-dimensional vector
 * 二维向量
 */
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function distance(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Recognised control keys and their bit in the recorded input mask
 * 可识别的控制按键及其在输入掩码中的位
 */
export enum ControlKey {
  Up = 1 << 0,
  Down = 1 << 1,
  Left = 1 << 2,
  Right = 1 << 3,
  Action1 = 1 << 4,
  Action2 = 1 << 5,
  Action3 = 1 << 6,
  Use = 1 << 7,
  Inventory = 1 << 8,
  Pickup = 1 << 9,
  Jump = 1 << 10,
  Taunts = 1 << 11,
  Map = 1 << 12,
  Bubbles = 1 << 13,
  Crouch = 1 << 14
}

export const ALL_CONTROL_KEYS: readonly ControlKey[] = [
  ControlKey.Up,
  ControlKey.Down,
  ControlKey.Left,
  ControlKey.Right,
  ControlKey.Action1,
  ControlKey.Action2,
  ControlKey.Action3,
  ControlKey.Use,
  ControlKey.Inventory,
  ControlKey.Pickup,
  ControlKey.Jump,
  ControlKey.Taunts,
  ControlKey.Map,
  ControlKey.Bubbles,
  ControlKey.Crouch
];

/**
 * Bitmask over ControlKey values (uint16)
 * 按键位掩码（uint16）
 */
export type KeyMask = number;

export const MAX_NET_ID = 0xFFFF;
export const MAX_KEY_MASK = 0xFFFF;
