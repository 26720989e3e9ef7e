import path from 'node:path';
import { fail, ok } from './result.js';
import type { StoreResult } from './result.js';

export interface ResolvedCardPath {
  absPath: string;
  relPath: string; // `<project>/<remainder>` with forward slashes
  project: string;
  remainder: string[];
}

export interface ResolvedScope {
  absPath: string;
  relPath: string; // '' for the whole store
  project: string | null;
}

function isAbsoluteAnywhere(p: string): boolean {
  return path.posix.isAbsolute(p) || path.win32.isAbsolute(p);
}

/**
 * Splits a caller path into plain segments. Both separators are accepted;
 * empty and `.` segments vanish. Absolute paths, `..` and other
 * dot-prefixed segments are rejected.
 */
export function splitLogicalPath(p: string): StoreResult<string[]> {
  if (isAbsoluteAnywhere(p)) return fail('INVALID_PATH', 'path must be relative');
  const segments = p.split(/[\\/]+/).filter((s) => s !== '' && s !== '.');
  if (segments.includes('..')) return fail('INVALID_PATH', 'path must not contain parent references');
  // scans never list dot-entries, so cards may not live under one
  if (segments.some((s) => s.startsWith('.'))) return fail('INVALID_PATH', "path segments must not start with '.'");
  return ok(segments);
}

function checkProjectName(project: string): StoreResult<string> {
  if (project === '' || project.startsWith('.') || /[\\/]/.test(project)) {
    return fail('INVALID_PATH', `invalid project name '${project}'`);
  }
  return ok(project);
}

function insideRoot(root: string, absPath: string): boolean {
  const rel = path.relative(root, absPath);
  return rel !== '' && !rel.startsWith('..') && !path.isAbsolute(rel);
}

/**
 * Maps (project?, logical path) to a file under `<root>/<project>/`.
 *
 * - No project: the first of two or more segments is the project; a bare
 *   single segment is ambiguous and fails with PROJECT_REQUIRED.
 * - Explicit project: a leading segment equal to it is dropped, any other
 *   leading folder nests inside the project.
 */
export function resolveCardPath(root: string, project: string | undefined, logicalPath: string): StoreResult<ResolvedCardPath> {
  const split = splitLogicalPath(logicalPath);
  if (!split.ok) return split;
  const parts = split.value;

  let projectName: string;
  let remainder: string[];
  if (project === undefined) {
    if (parts.length < 2) {
      return fail('PROJECT_REQUIRED', 'project must be specified either as argument or as the top-level folder in path');
    }
    projectName = parts[0];
    remainder = parts.slice(1);
  } else {
    const checked = checkProjectName(project);
    if (!checked.ok) return checked;
    projectName = checked.value;
    remainder = parts.length >= 2 && parts[0] === projectName ? parts.slice(1) : parts;
    if (remainder.length === 0) return fail('INVALID_PATH', 'path must name a file inside the project');
  }

  const absPath = path.join(root, projectName, ...remainder);
  if (!insideRoot(root, absPath)) return fail('INVALID_PATH', 'path escapes the store root');

  return ok({ absPath, relPath: [projectName, ...remainder].join('/'), project: projectName, remainder });
}

/**
 * Scope for browsing operations (list, structure, tags). Unlike
 * resolveCardPath a single bare segment is taken as the project.
 */
export function resolveScope(root: string, project: string | undefined, subpath = ''): StoreResult<ResolvedScope> {
  const split = splitLogicalPath(subpath);
  if (!split.ok) return split;
  const parts = split.value;

  let projectName: string | null;
  let rest: string[];
  if (project === undefined) {
    projectName = parts.length > 0 ? parts[0] : null;
    rest = parts.slice(1);
  } else {
    const checked = checkProjectName(project);
    if (!checked.ok) return checked;
    projectName = checked.value;
    rest = parts.length >= 2 && parts[0] === projectName ? parts.slice(1) : parts;
  }

  if (projectName === null) return ok({ absPath: root, relPath: '', project: null });

  const segments = [projectName, ...rest];
  return ok({ absPath: path.join(root, ...segments), relPath: segments.join('/'), project: projectName });
}

/** Forward-slash path of `absPath` relative to the store root. */
export function toRelPosix(root: string, absPath: string): string {
  return path.relative(root, absPath).split(path.sep).join('/');
}

function escapeRegExp(s: string): string {
  return s.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles a root-relative glob. `**` spans zero or more directories,
 * `*` and `?` stay within one segment.
 */
export function globToRegExp(glob: string): RegExp {
  const segments = glob.split('/').filter((s) => s !== '');
  let source = '';
  segments.forEach((segment, i) => {
    const last = i === segments.length - 1;
    if (segment === '**') {
      source += last ? '.*' : '(?:[^/]+/)*';
      return;
    }
    source += escapeRegExp(segment).replace(/\*/g, '[^/]*').replace(/\?/g, '[^/]');
    if (!last) source += '/';
  });
  return new RegExp(`^${source}$`);
}
