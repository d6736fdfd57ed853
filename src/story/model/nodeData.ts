// ─────────────────────────────────────────────────────────────────────────────
// Node Data - Variant-specific fields in interchange form
// ─────────────────────────────────────────────────────────────────────────────

export type NodeData = Record<string, unknown>

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function readString(data: NodeData, key: string, fallback: string): string {
  const value = data[key]
  return typeof value === 'string' ? value : fallback
}

export function readNumber(data: NodeData, key: string, fallback: number): number {
  const value = data[key]
  return typeof value === 'number' && !Number.isNaN(value) ? value : fallback
}

export function readBoolean(data: NodeData, key: string, fallback: boolean): boolean {
  const value = data[key]
  return typeof value === 'boolean' ? value : fallback
}

/** Read a string union member, falling back when the stored value is not one of the options */
export function readEnum<T extends string>(
  data: NodeData,
  key: string,
  options: readonly T[],
  fallback: T
): T {
  const value = data[key]
  const match = options.find(option => option === value)
  return match ?? fallback
}

export function readRecords(data: NodeData, key: string): Record<string, unknown>[] {
  const value = data[key]
  return Array.isArray(value) ? value.filter(isRecord) : []
}
