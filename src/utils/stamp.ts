// src/utils/stamp.ts

/** Sortable, path-safe timestamp, e.g. 2025-03-01T10-20-30-123Z. */
export const fileStamp = (date: Date = new Date()) =>
  date.toISOString().replace(/[:.]/g, '-');
