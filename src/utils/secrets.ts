// ── Sensitive data placeholders ─────────────────────────────
// Text recorded from the agent carries <secret>NAME</secret> markers
// instead of real values. The map is passed explicitly at each call site.

export type SensitiveDataMap = Readonly<Record<string, string | null | undefined>>;

export function secretPlaceholder(name: string): string {
  return `<secret>${name}</secret>`;
}

const PLACEHOLDER = /<secret>(\w+)<\/secret>/g;

/**
 * Replace every `<secret>NAME</secret>` whose NAME is in `map`, in one pass.
 * Placeholders inside a value are resolved too, so a second call changes
 * nothing. Unknown placeholders, and ones whose value refers back to
 * themselves, are left untouched.
 */
export function replaceSensitiveData(text: string, map: SensitiveDataMap): string {
  return text.replace(PLACEHOLDER, (match, name: string) => resolvePlaceholder(name, map, []) ?? match);
}

/** Value of `name` with nested placeholders resolved; `undefined` if unknown or cyclic. */
function resolvePlaceholder(
  name: string,
  map: SensitiveDataMap,
  resolving: readonly string[],
): string | undefined {
  if (!Object.hasOwn(map, name) || resolving.includes(name)) return undefined;

  let cyclic = false;
  const value = (map[name] ?? '').replace(PLACEHOLDER, (match, inner: string) => {
    if (!Object.hasOwn(map, inner)) return match;
    const resolved = resolvePlaceholder(inner, map, [...resolving, name]);
    if (resolved === undefined) cyclic = true;
    return resolved ?? match;
  });
  return cyclic ? undefined : value;
}

/** Build a placeholder map from environment variables named after each placeholder. */
export function loadSensitiveData(
  names: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const map: Record<string, string> = {};
  for (const name of names) {
    const value = env[name];
    if (value !== undefined) {
      map[name] = value;
    }
  }
  return map;
}
