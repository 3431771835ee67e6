import { resolve, normalize } from 'node:path';
import { existsSync, realpathSync } from 'node:fs';
import type { Config } from '../types/config.js';
import type { Logger } from '../utils/logger.js';

export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export interface PathValidationResult extends ValidationResult {
  resolvedPath?: string;
}

export class SecurityValidator {
  private allowedPaths: Set<string>;
  private blockedCommands: Set<string>;
  private readonly hasUnrestrictedAccess: boolean;

  constructor(
    config: Pick<Config, 'allowedDirectories' | 'blockedCommands'>,
    private logger: Logger
  ) {
    this.hasUnrestrictedAccess = config.allowedDirectories.length === 0;

    if (this.hasUnrestrictedAccess) {
      logger.warn('allowedDirectories is empty: sessions may start in any directory');
    }

    // Store realpaths so symlinked allowed directories compare correctly
    this.allowedPaths = new Set(
      config.allowedDirectories.map(dir => {
        const resolved = resolve(dir);
        return existsSync(resolved) ? realpathSync(resolved) : resolved;
      })
    );
    this.blockedCommands = new Set(config.blockedCommands.map(cmd => cmd.trim().toLowerCase()));
  }

  /**
   * Check that a session working directory lies inside the allowed directories.
   * Symlinks are resolved first, so a link cannot point outside.
   */
  validatePath(requestedPath: string): PathValidationResult {
    try {
      const absolutePath = resolve(normalize(requestedPath));
      const realPath = existsSync(absolutePath)
        ? realpathSync(absolutePath)
        : absolutePath;

      if (this.hasUnrestrictedAccess) {
        this.logger.debug({ path: realPath }, 'Unrestricted access granted');
        return { valid: true, resolvedPath: realPath };
      }

      const isAllowed = Array.from(this.allowedPaths).some(allowedPath =>
        realPath === allowedPath || realPath.startsWith(allowedPath + '/')
      );

      if (!isAllowed) {
        return {
          valid: false,
          error: `Path outside allowed directories: ${requestedPath}`,
        };
      }

      return { valid: true, resolvedPath: realPath };
    } catch (error) {
      return {
        valid: false,
        error: `Could not validate path: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  /**
   * Check a launch command against the blocked list, both as a whole and
   * per pipeline/sequence segment.
   */
  validateCommand(command: string): ValidationResult {
    const normalizedCmd = command.trim().toLowerCase();

    if (this.blockedCommands.has(normalizedCmd)) {
      return {
        valid: false,
        error: `Blocked command: ${command}`,
      };
    }

    const parts = normalizedCmd.split(/[|;&]/).map(p => p.trim());
    for (const part of parts) {
      if (this.blockedCommands.has(part)) {
        return {
          valid: false,
          error: `Blocked command segment: ${part}`,
        };
      }
    }

    return { valid: true };
  }
}
