import type { SessionEntry } from '../types/config.js';
import type { LaunchTransform, SessionConfig } from '../types/session.js';
import type { SecurityValidator } from '../security/validator.js';
import type { ExitTranscriptStore } from './transcripts.js';
import type { Logger } from '../utils/logger.js';

const PLACEHOLDER_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface SessionSetupDeps {
  validator: SecurityValidator;
  transcripts: ExitTranscriptStore;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}

export function defaultViewTag(name: string): string {
  return `permterm://${name}`;
}

/**
 * Replace ${VAR} placeholders from `env`. Any unset or empty variable makes
 * the whole command empty, meaning there is nothing to launch.
 */
export function expandPlaceholders(command: string, env: NodeJS.ProcessEnv): string {
  let missing = false;
  const expanded = command.replace(PLACEHOLDER_PATTERN, (_match, variable: string) => {
    const value = env[variable];
    if (value === undefined || value === '') {
      missing = true;
      return '';
    }
    return value;
  });
  return missing ? '' : expanded;
}

export function quoteShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Map configuration entries to registry configurations. The launch transform
 * expands placeholders, screens the result against the blocked commands and
 * prefixes the working directory change.
 */
export function buildSessionConfigs(entries: readonly SessionEntry[], deps: SessionSetupDeps): SessionConfig[] {
  const { validator, transcripts, logger } = deps;
  const env = deps.env ?? process.env;
  const tags = new Map<string, string>();

  return entries.map(entry => {
    const viewTag = entry.viewTag ?? defaultViewTag(entry.name);
    const owner = tags.get(viewTag);
    if (owner !== undefined) {
      throw new Error(`Sessions "${owner}" and "${entry.name}" share viewTag ${viewTag}`);
    }
    tags.set(viewTag, entry.name);

    let cwd: string | undefined;
    if (entry.cwd !== undefined) {
      const result = validator.validatePath(entry.cwd);
      if (!result.valid) {
        throw new Error(`Invalid cwd for session "${entry.name}": ${result.error}`);
      }
      cwd = result.resolvedPath;
    }

    const onBeforeLaunch: LaunchTransform = (command) => {
      const expanded = expandPlaceholders(command, env).trim();
      if (expanded === '') {
        logger.warn({ session: entry.name, launchSpec: command }, 'Launch command resolved to nothing');
        return '';
      }

      const check = validator.validateCommand(expanded);
      if (!check.valid) {
        logger.warn({ session: entry.name, reason: check.error }, 'Launch command blocked');
        return '';
      }

      return cwd === undefined ? expanded : `cd ${quoteShellArg(cwd)} && ${expanded}`;
    };

    const config: SessionConfig = {
      name: entry.name,
      launchSpec: entry.launchSpec,
      viewTag,
      onBeforeLaunch,
    };

    if (entry.recordExitOutput) {
      config.onExit = (lines) => {
        transcripts.record(entry.name, lines);
        logger.info({ session: entry.name, lines: lines.length }, 'Exit output recorded');
      };
    }

    return config;
  });
}
