export enum SelectionStrategy {
  LEAST_LOAD = 'LEAST_LOAD',
  ROUND_ROBIN = 'ROUND_ROBIN',
  PRIORITY = 'PRIORITY',
  /** пока совпадает с LEAST_LOAD */
  BALANCED = 'BALANCED',
}

export function isSelectionStrategy(value: unknown): value is SelectionStrategy {
  return Object.values(SelectionStrategy).some((s) => s === value);
}
