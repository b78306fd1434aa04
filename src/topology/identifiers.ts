/**
 * Identifier normalization shared by every join in the topology builder
 */

/**
 * Canonical device path: `/dev/` prefix for bare kernel names, no repeated or
 * trailing slashes. Returns an empty string for blank input.
 */
export function normalizeDevicePath(path: string): string {
  const trimmed = path.trim();
  if (trimmed === '') return '';

  const absolute = trimmed.startsWith('/') ? trimmed : `/dev/${trimmed}`;
  const collapsed = absolute.replace(/\/{2,}/g, '/');
  return collapsed.length > 1 ? collapsed.replace(/\/$/, '') : collapsed;
}

export function lvIdentifier(vgName: string, lvName: string): string {
  return `${vgName}/${lvName}`;
}

/**
 * Device-mapper name of an LV: hyphens inside either name are doubled and a
 * single hyphen joins them (`vg-a`, `lv-b` -> `vg--a-lv--b`)
 */
export function encodeMapperName(vgName: string, lvName: string): string {
  return `${vgName.replace(/-/g, '--')}-${lvName.replace(/-/g, '--')}`;
}

/**
 * Every device path under which an LV can appear
 */
export function lvPathAliases(vgName: string, lvName: string): string[] {
  return [`/dev/${vgName}/${lvName}`, `/dev/mapper/${encodeMapperName(vgName, lvName)}`];
}
