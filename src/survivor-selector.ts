import { basename } from 'path';
import { compareNames } from './directory-walker.js';

export interface SurvivorCandidate {
  path: string;
  mtimeMs: number;
}

export interface SurvivorSelection {
  kept: string;
  /** Every other member, in group order. */
  remove: string[];
}

/**
 * Split a file name at its final extension. A leading dot does not start an extension and a
 * trailing dot leaves the extension empty: `.bashrc` and `notes.` are all stem.
 */
export function splitExtension(name: string): { stem: string; extension: string } {
  const index = name.lastIndexOf('.');
  if (index <= 0 || index === name.length - 1) {
    return { stem: name, extension: '' };
  }
  return { stem: name.slice(0, index), extension: name.slice(index) };
}

export function stemLength(path: string): number {
  return splitExtension(basename(path)).stem.length;
}

/**
 * Keep the member with the shortest name (extension excluded). Ties go to the most recently
 * modified file, then to the lexicographically smallest path.
 */
export function selectSurvivor(members: SurvivorCandidate[]): SurvivorSelection {
  if (members.length === 0) {
    throw new Error('Cannot select a survivor from an empty group');
  }

  const shortest = Math.min(...members.map((member) => stemLength(member.path)));
  const candidates = members.filter((member) => stemLength(member.path) === shortest);

  const [survivor] = [...candidates].sort((left, right) => {
    if (left.mtimeMs !== right.mtimeMs) {
      return right.mtimeMs - left.mtimeMs;
    }
    return compareNames(left.path, right.path);
  });

  return {
    kept: survivor.path,
    remove: members.filter((member) => member.path !== survivor.path).map((member) => member.path),
  };
}
