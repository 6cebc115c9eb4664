import { Decimal } from "./decimal";

/**
 * Maps the items of a range onto the numeric scale progressions iterate on.
 * `numToItem(itemToNum(x))` must give back an equivalent item.
 */
export interface ItemConversion<Item> {
  itemToNum(item: Item): Decimal;
  numToItem(num: Decimal): Item;
  formatItem?(item: Item): string;
}

/**
 * A conversion whose step may live in a different domain from its items,
 * e.g. a `Duration` stepping over `Date`s.
 */
export interface Conversion<Item, Step = Item> extends ItemConversion<Item> {
  stepToNum(step: Step): Decimal;
  numToStep(num: Decimal): Step;
  formatStep?(step: Step): string;
}

/** Fills in the step methods by delegating to the item methods. */
export function sameStepConversion<Item>(
  conversion: ItemConversion<Item>
): Conversion<Item, Item> {
  return {
    itemToNum: (item) => conversion.itemToNum(item),
    numToItem: (num) => conversion.numToItem(num),
    stepToNum: (step) => conversion.itemToNum(step),
    numToStep: (num) => conversion.numToItem(num),
    formatItem: conversion.formatItem && conversion.formatItem.bind(conversion),
    formatStep: conversion.formatItem && conversion.formatItem.bind(conversion),
  };
}

/** Steps counted as plain numbers, whatever the item type. */
export const numericSteps = {
  stepToNum: (step: number): Decimal => Decimal.fromNumber(step),
  numToStep: (num: Decimal): number => num.toNumber(),
  formatStep: (step: number): string => Decimal.fromNumber(step).toString(),
};

export function formatItem<Item>(
  conversion: ItemConversion<Item>,
  item: Item
): string {
  return conversion.formatItem ? conversion.formatItem(item) : String(item);
}

export function formatStep<Item, Step>(
  conversion: Conversion<Item, Step>,
  step: Step
): string {
  return conversion.formatStep ? conversion.formatStep(step) : String(step);
}
