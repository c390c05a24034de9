import type { RecordFields } from '../types/record.js';

export interface FilteredFields {
  fields: RecordFields;
  /** Field names the destination does not recognize */
  dropped: string[];
}

/** Keep only the fields the destination schema knows about. */
export function filterKnownFields(fields: RecordFields, known: ReadonlySet<string>): FilteredFields {
  const kept: RecordFields = {};
  const dropped: string[] = [];
  for (const [name, value] of Object.entries(fields)) {
    if (known.has(name)) kept[name] = value;
    else dropped.push(name);
  }
  return { fields: kept, dropped };
}
