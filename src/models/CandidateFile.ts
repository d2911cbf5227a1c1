import { relative } from 'path';
import { FileState, FailureKind, getExtension } from '../types/index.js';

export interface SizeSample {
  at: Date;
  size: number;
}

export interface CandidateFailure {
  kind: FailureKind;
  reason: string;
}

export interface CandidateFile {
  /** Absolute file path, identity key */
  path: string;

  /** Watch root the file was found under */
  watchRoot: string;

  /** Path relative to the watch root */
  relativePath: string;

  /** Lower-case extension without the dot */
  extension: string;

  /** When the watcher first saw the path */
  detectedAt: Date;

  /** Sizes observed while waiting for the file to settle */
  sizeSamples: SizeSample[];

  state: FileState;

  /** Filled in at validation */
  size: number | null;
  modifiedAt: Date | null;
  createdAt: Date | null;

  /** Where the file ended up once archived */
  archivePath: string | null;

  failure: CandidateFailure | null;
}

const TRANSITIONS: Record<FileState, readonly FileState[]> = {
  [FileState.DISCOVERED]: [FileState.STABILIZING, FileState.STABLE, FileState.REJECTED, FileState.FAILED],
  [FileState.STABILIZING]: [FileState.STABILIZING, FileState.STABLE, FileState.FAILED],
  [FileState.STABLE]: [FileState.VALIDATED, FileState.REJECTED, FileState.FAILED],
  [FileState.VALIDATED]: [FileState.UPLOADING, FileState.FAILED],
  [FileState.UPLOADING]: [FileState.UPLOADED, FileState.FAILED],
  [FileState.UPLOADED]: [FileState.ARCHIVED, FileState.FAILED],
  [FileState.ARCHIVED]: [],
  [FileState.REJECTED]: [],
  [FileState.FAILED]: [],
};

export function createCandidateFile(path: string, watchRoot: string): CandidateFile {
  return {
    path,
    watchRoot,
    relativePath: relative(watchRoot, path),
    extension: getExtension(path),
    detectedAt: new Date(),
    sizeSamples: [],
    state: FileState.DISCOVERED,
    size: null,
    modifiedAt: null,
    createdAt: null,
    archivePath: null,
    failure: null,
  };
}

export function isTerminal(state: FileState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: FileState, to: FileState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Move a candidate to its next state; throws on an illegal transition
 */
export function transition(candidate: CandidateFile, next: FileState): void {
  if (!canTransition(candidate.state, next)) {
    throw new Error(`Illegal state transition for ${candidate.path}: ${candidate.state} -> ${next}`);
  }
  candidate.state = next;
}

export function recordSizeSample(candidate: CandidateFile, size: number, at: Date = new Date()): void {
  candidate.sizeSamples.push({ at, size });
}

export function markRejected(candidate: CandidateFile, reason: string): void {
  transition(candidate, FileState.REJECTED);
  candidate.failure = { kind: FailureKind.VALIDATION_REJECTION, reason };
}

export function markFailed(candidate: CandidateFile, kind: FailureKind, reason: string): void {
  transition(candidate, FileState.FAILED);
  candidate.failure = { kind, reason };
}

export function markArchived(candidate: CandidateFile, archivePath: string): void {
  transition(candidate, FileState.ARCHIVED);
  candidate.archivePath = archivePath;
}
