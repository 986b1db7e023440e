export type SnapshotValue = string | number | boolean | null | undefined;

const SECRET_KEY = /(TOKEN|SECRET|PASSWORD)$/;
const REDACTED = "<redacted>";

/** Mask secret-looking keys; unset secrets stay visibly unset. */
export function redactConfigSnapshot(
  snapshot: Readonly<Record<string, SnapshotValue>>
): Record<string, SnapshotValue> {
  const out: Record<string, SnapshotValue> = {};
  for (const [key, value] of Object.entries(snapshot)) {
    out[key] = SECRET_KEY.test(key) && value ? REDACTED : value;
  }
  return out;
}
