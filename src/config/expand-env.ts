/**
 * `${VAR}` and `${VAR:-fallback}` expansion over a parsed YAML tree.
 * Unset variables without a fallback expand to "".
 */
export function expandEnvVars(value: string, env: Record<string, string | undefined>): string {
  return value.replace(/\$\{(\w+)(?::-([^}]*))?\}/g, (_, key: string, fallback: string | undefined) => {
    const found = env[key];
    if (found !== undefined && found !== "") return found;
    return fallback ?? "";
  });
}

export function expandEnvVarsDeep(
  obj: unknown,
  env: Record<string, string | undefined>,
): unknown {
  if (typeof obj === "string") return expandEnvVars(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandEnvVarsDeep(v, env));
  if (obj && typeof obj === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) out[k] = expandEnvVarsDeep(v, env);
    return out;
  }
  return obj;
}
