import { roundTo } from "../common/numbers";

export const CHANGE_TYPES = ["percentage", "absolute"] as const;
export type ChangeType = (typeof CHANGE_TYPES)[number];

export const MAX_ROUND_TO = 4;

/**
 * `percentage` scales the price by (1 + value/100), `absolute` adds the value.
 * The result never drops below zero.
 */
export function calculateNewPrice(
  currentPrice: number,
  changeType: ChangeType,
  changeValue: number,
  digits: number
) {
  const raw =
    changeType === "percentage" ? currentPrice * (1 + changeValue / 100) : currentPrice + changeValue;

  return roundTo(Math.max(0, raw), digits);
}

export function isChangeType(value: string): value is ChangeType {
  return (CHANGE_TYPES as readonly string[]).includes(value);
}
