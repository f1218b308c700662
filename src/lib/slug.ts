function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\-]/g, '\\$&');
}

/**
 * Lower-case ASCII slug, e.g. `Zone 1/Température` -> `zone_1_temperature`.
 * Used for cache keys and sensor handles.
 */
export function slugify(value: string | number, separator = '_'): string {
  const sep = escapeRegExp(separator);
  return String(value)
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/'/g, '')
    .replace(/[^a-z0-9]+/g, separator)
    .replace(new RegExp(`^(?:${sep})+|(?:${sep})+$`, 'g'), '');
}
