/**
 * Home directory resolution ($MURMUR_HOME, default ~/.murmur)
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";

export function resolveMurmurHome(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.MURMUR_HOME?.trim();
  if (fromEnv) return resolvePathLike(fromEnv, env);
  return join(homedir(), ".murmur");
}

/** Make sure ${MURMUR_HOME} expands in config values even when unset. */
export function ensureMurmurHomeEnv(env: NodeJS.ProcessEnv = process.env): string {
  const home = resolveMurmurHome(env);
  env.MURMUR_HOME = home;
  return home;
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(resolveMurmurHome(env), "app.yaml");
}

/** Expand a leading ~ and resolve to an absolute path. */
export function resolvePathLike(path: string, env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME ?? env.USERPROFILE ?? homedir();
  if (path === "~") return home;
  if (path.startsWith("~/")) return resolve(home, path.slice(2));
  return resolve(path);
}
