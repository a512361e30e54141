/**
 * Helpers built on top of the managers
 */

import type { EntityFieldManager } from './managers';

/**
 * Rename each row's field-id keys to field names, looking ids up among key
 * fields first and data fields second. Ids that match no field are kept as
 * they are; values are never touched.
 *
 * @example
 * ```typescript
 * const rows = await client.activities.getRecordData(activityId);
 * const named = await exportData(client, rows);
 * // [{ 'Compound ID': 'CMP-1', 'IC50 (nM)': 12.5 }]
 * ```
 */
export async function exportData(
  client: { entityFields: EntityFieldManager },
  rows: ReadonlyArray<Record<string, unknown>>
): Promise<Array<Record<string, unknown>>> {
  const keyFields = await client.entityFields.listKeyFields();
  const dataFields = await client.entityFields.listDataFields();

  const names = new Map<string, string>();
  for (const field of [...dataFields, ...keyFields]) {
    names.set(field.id, field.field_name);
  }

  return rows.map((row) => {
    const named: Record<string, unknown> = {};
    for (const [fieldId, value] of Object.entries(row)) {
      named[names.get(fieldId) ?? fieldId] = value;
    }
    return named;
  });
}
