function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads `field` from the snapshot. An own key with the exact name wins over a
 * dotted path, so `trigger.form_id` also resolves `{ trigger: { form_id } }`.
 */
export function resolveFieldPath(
  snapshot: Record<string, unknown>,
  field: string,
): unknown {
  if (Object.prototype.hasOwnProperty.call(snapshot, field)) {
    return snapshot[field];
  }

  let current: unknown = snapshot;
  for (const segment of field.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}
