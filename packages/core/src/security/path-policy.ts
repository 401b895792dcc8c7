/**
 * Read/write path checks for the cooperative sandbox.
 *
 * Writes are confined to `{workspaceRoot}/{1..maxReportSlots}/reports`.
 * Reads accept relative paths, the scratch root, and (in sandbox mode) the
 * workspace root. Paths are canonicalised first: made absolute and resolved
 * through symlinks on the longest ancestor that exists.
 */

import { realpathSync } from 'node:fs';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { SandboxConfig } from '@termjudge/shared';
import type { SecureLogger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';

export type PathPolicyConfig = Pick<
  SandboxConfig,
  'enabled' | 'workspaceRoot' | 'scratchRoot' | 'pathRestriction' | 'maxReportSlots'
>;

const SLOT_PATTERN = /^[1-9]\d*$/;

/**
 * Absolute, symlink-resolved form of `path`. Missing trailing components are
 * re-attached to the realpath of the deepest existing ancestor. Returns null
 * for malformed input.
 */
export function canonicalizePath(path: string, cwd: string = process.cwd()): string | null {
  if (path.length === 0 || path.includes('\0')) return null;

  const absolute = resolve(cwd, path);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = realpathSync(current);
      return missing.length > 0 ? join(real, ...missing.reverse()) : real;
    } catch {
      const parent = dirname(current);
      if (parent === current) return absolute;
      missing.push(current.slice(parent.length).replace(/^[\\/]+/, ''));
      current = parent;
    }
  }
}

/** True when `child` equals `parent` or lies beneath it. */
export function isWithin(child: string, parent: string): boolean {
  if (child === parent) return true;
  const prefix = parent.endsWith(sep) ? parent : parent + sep;
  return child.startsWith(prefix);
}

export class PathPolicy {
  private readonly logger: SecureLogger;

  constructor(
    private readonly config: PathPolicyConfig,
    logger: SecureLogger = createNoopLogger()
  ) {
    this.logger = logger.child({ component: 'PathPolicy' });
  }

  isPathAllowedForWrite(path: string): boolean {
    if (!this.config.pathRestriction) {
      this.logger.debug('Write allowed, path restriction off', { path });
      return true;
    }

    const target = canonicalizePath(path);
    const workspace = canonicalizePath(this.config.workspaceRoot);
    let allowed = false;

    if (target && workspace && isWithin(target, workspace)) {
      const [slot, dir] = relative(workspace, target).split(sep);
      allowed =
        slot !== undefined &&
        SLOT_PATTERN.test(slot) &&
        Number(slot) <= this.config.maxReportSlots &&
        dir === 'reports';
    }

    this.logger.debug('Write path decision', { path, resolved: target, allowed });
    return allowed;
  }

  isPathAllowedForRead(path: string): boolean {
    if (path.length === 0 || path.includes('\0')) {
      this.logger.debug('Read path rejected, malformed', { path });
      return false;
    }

    if (!isAbsolute(path)) {
      this.logger.debug('Read allowed, relative path', { path });
      return true;
    }

    const target = canonicalizePath(path);
    if (!target) return false;

    const scratch = canonicalizePath(this.config.scratchRoot);
    let allowed: boolean;
    if (scratch && isWithin(target, scratch)) {
      allowed = true;
    } else if (this.config.enabled) {
      const workspace = canonicalizePath(this.config.workspaceRoot);
      allowed = workspace !== null && isWithin(target, workspace);
    } else {
      allowed = true;
    }

    this.logger.debug('Read path decision', { path, resolved: target, allowed });
    return allowed;
  }
}
