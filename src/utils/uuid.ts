import { v4 as uuidv4 } from 'uuid';

export function generateId(prefix?: string): string {
  const id = uuidv4();
  return prefix ? `${prefix}-${id}` : id;
}

/** Qdrant point ids must be bare UUIDs or unsigned integers. */
export function generatePointId(): string {
  return uuidv4();
}
