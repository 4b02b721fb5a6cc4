/**
 * Shared vocabulary of the experiment container.
 */

/**
 * Dimension a linked collection is subset along: 1 = rows/elements, 2 = columns.
 */
export type SubsetBy = 1 | 2;

/**
 * Declared storage locations of an experiment.
 */
export const SLOT_KINDS = [
  'sampleData',
  'experimentFiles',
  'metadata',
  'otherData',
  'qdata',
  'spectra',
] as const;

export type SlotKind = (typeof SLOT_KINDS)[number];

export function isSlotKind(value: string): value is SlotKind {
  return SLOT_KINDS.some((kind) => kind === value);
}

/** Slots whose content is itself the linked collection; their fields only serve as join keys. */
export const COLLECTION_SLOTS: readonly SlotKind[] = ['sampleData', 'qdata', 'spectra'];

export function isCollectionSlot(slot: string): boolean {
  return COLLECTION_SLOTS.some((kind) => kind === slot);
}

export function isSubsetBy(value: unknown): value is SubsetBy {
  return value === 1 || value === 2;
}
