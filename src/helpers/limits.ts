/** Bounds for user-entered records, checked by the tool schemas and the entry forms. */
export const LIMITS = {
  maxWeightKg: 500,
  maxDurationMinutes: 1440,
  maxCalories: 20000,
  maxNotesLength: 500,
} as const;
