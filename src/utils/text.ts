/**
 * Capitalizes the first letter of every run of letters and lowercases the rest,
 * so `v17s1a3` becomes `V17S1A3` and `river restoration` becomes `River Restoration`.
 */
export const titleCase = (text: string): string =>
  text.replace(/\p{L}+/gu, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

export const truncate = (text: string, maxLength: number, ellipsis = '...'): string =>
  `${text.slice(0, maxLength)}${ellipsis}`;
