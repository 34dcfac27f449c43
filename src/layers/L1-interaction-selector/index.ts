import { PactCheckError, type Interaction } from '../../shared/types';

/**
 * Narrow interactions to those matching both filters (exact match; an empty
 * filter does not constrain). Order is preserved and the input is not mutated.
 */
export function selectInteractions(
  interactions: readonly Interaction[],
  description = '',
  state = '',
): Interaction[] {
  const selected = interactions.filter(
    (i) =>
      (description === '' || i.description === description) &&
      (state === '' || i.providerState === state),
  );

  if ((description !== '' || state !== '') && selected.length === 0) {
    throw new PactCheckError({
      code: 'NO_MATCHING_INTERACTIONS',
      message: 'The specified description and/or provider state filter yielded no interactions.',
      context: {
        interaction: description || undefined,
        providerState: state || undefined,
      },
    });
  }

  return selected;
}
