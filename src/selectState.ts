export enum SelectState {
  None,
  Partial,
  Full,
}

/**
 * Folds the states of a directory's children into the directory's own state.
 * Returns null when there are no children to decide from.
 */
export function combineStates(states: SelectState[]): SelectState | null {
  if (states.length === 0) return null;

  if (states.every((state) => state === SelectState.Full)) return SelectState.Full;
  if (states.every((state) => state === SelectState.None)) return SelectState.None;
  return SelectState.Partial;
}

// State handed to freshly listed children. A partial parent only summarises
// children it already has, so new ones count as selected.
export function inheritedState(parent: SelectState): SelectState {
  return parent === SelectState.None ? SelectState.None : SelectState.Full;
}
