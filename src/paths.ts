/**
 * Credentials file location.
 *
 * Default locations:
 *   Linux:   $XDG_CONFIG_HOME/credkeep/credentials.toml (~/.config when unset)
 *   macOS:   ~/Library/Application Support/credkeep/credentials.toml
 *   Windows: %APPDATA%\credkeep\credentials.toml
 *
 * `CREDKEEP_FILE` overrides the default; an explicit path overrides both.
 */

import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'credkeep';
export const CREDENTIALS_FILENAME = 'credentials.toml';
export const FILE_ENV_VAR = 'CREDKEEP_FILE';

export interface PathResolverOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homeDir?: string;
  cwd?: string;
}

interface ResolvedOptions {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  homeDir: string;
  cwd: string;
}

function withDefaults(options: PathResolverOptions): ResolvedOptions {
  return {
    env: options.env ?? process.env,
    platform: options.platform ?? process.platform,
    homeDir: options.homeDir ?? os.homedir(),
    cwd: options.cwd ?? process.cwd(),
  };
}

function pathFor(platform: NodeJS.Platform): path.PlatformPath {
  return platform === 'win32' ? path.win32 : path.posix;
}

/**
 * Expand a leading `~` to the home directory and make the result absolute.
 * `~user` forms are left alone.
 */
export function expandHome(input: string, options: PathResolverOptions = {}): string {
  const { platform, homeDir, cwd } = withDefaults(options);
  const p = pathFor(platform);

  let expanded = input;
  if (input === '~') {
    expanded = homeDir;
  } else if (input.startsWith('~/') || input.startsWith('~\\')) {
    expanded = p.join(homeDir, input.slice(2));
  }
  return p.resolve(cwd, expanded);
}

/** Per-user configuration directory for credkeep. Does not create it. */
export function defaultConfigDir(options: PathResolverOptions = {}): string {
  const { env, platform, homeDir } = withDefaults(options);
  const p = pathFor(platform);

  let base: string;
  if (platform === 'win32') {
    base = env.APPDATA || homeDir;
  } else if (platform === 'darwin') {
    base = p.join(homeDir, 'Library', 'Application Support');
  } else {
    const xdg = env.XDG_CONFIG_HOME;
    // Relative values are invalid per the XDG base directory rules.
    base = xdg && p.isAbsolute(xdg) ? xdg : p.join(homeDir, '.config');
  }
  return p.join(base, APP_NAME);
}

/**
 * Resolve the credentials file path.
 *
 * Resolution order:
 * 1. `explicitOverride`, when given and non-empty.
 * 2. `$CREDKEEP_FILE`, when set and non-empty.
 * 3. `credentials.toml` inside {@link defaultConfigDir}.
 *
 * Overrides are home-expanded and resolved against `cwd`. Always succeeds;
 * the returned path may not exist yet.
 */
export function resolveCredentialsPath(
  explicitOverride?: string,
  options: PathResolverOptions = {},
): string {
  if (explicitOverride) {
    return expandHome(explicitOverride, options);
  }

  const fromEnv = withDefaults(options).env[FILE_ENV_VAR];
  if (fromEnv) {
    return expandHome(fromEnv, options);
  }

  return pathFor(options.platform ?? process.platform).join(
    defaultConfigDir(options),
    CREDENTIALS_FILENAME,
  );
}
