import neo4j from 'neo4j-driver';

export const toJsNumber = (val: unknown): number => {
  if (typeof val === 'number') return val;
  if (neo4j.isInt(val)) return val.toNumber();
  return 0;
};

export const toOptionalString = (val: unknown): string | undefined =>
  typeof val === 'string' && val.length > 0 ? val : undefined;

export const toStringList = (val: unknown): string[] =>
  Array.isArray(val) ? val.filter((item): item is string => typeof item === 'string') : [];
