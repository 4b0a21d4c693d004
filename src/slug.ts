/**
 * Stable entity id for a free-text name.
 * e.g. "  Rogue!! " → "rogue", "Night City (Watson)" → "night_city_watson"
 *
 * Names that normalize the same always share an id, which is what lets a
 * delta for an already known entity update it instead of duplicating it.
 */
export function slug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}
