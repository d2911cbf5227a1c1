import { access, copyFile, link, mkdir, stat, unlink } from 'fs/promises';
import { constants } from 'fs';
import { dirname, extname, join, basename } from 'path';
import type { CandidateFile } from '../models/CandidateFile.js';
import { ArchiveMoveError, errorMessage, hasErrorCode } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

/** Filesystem calls used by the archiver; replaceable in tests */
export interface ArchiveFileOps {
  link: (existing: string, created: string) => Promise<void>;
  copyFile: (from: string, to: string, mode: number) => Promise<void>;
  unlink: (path: string) => Promise<void>;
}

const nodeFileOps: ArchiveFileOps = { link, copyFile, unlink };

/** Fresh names tried when destinations keep appearing under a move */
const MAX_NAME_ATTEMPTS = 10;

/** link(2) errors meaning the filesystem pair cannot share an inode */
const NO_HARD_LINK = ['EXDEV', 'EPERM', 'ENOTSUP', 'EOPNOTSUPP'];

/**
 * Moves uploaded files into the archive root, mirroring the layout under
 * their watch root. Never overwrites an existing file.
 */
export class Archiver {
  private archiveRoot: string;
  private ops: ArchiveFileOps;
  private now: () => Date;
  /** Destinations picked by moves that have not finished yet */
  private reserved: Set<string> = new Set();

  constructor(archiveRoot: string, ops: Partial<ArchiveFileOps> = {}, now: () => Date = () => new Date()) {
    this.archiveRoot = archiveRoot;
    this.ops = { ...nodeFileOps, ...ops };
    this.now = now;
  }

  /**
   * Ensure the archive root exists and is a directory
   */
  async prepare(): Promise<void> {
    try {
      await mkdir(this.archiveRoot, { recursive: true });
    } catch (error) {
      throw new ArchiveMoveError(
        `Cannot create archive directory ${this.archiveRoot}: ${errorMessage(error)}`,
        this.archiveRoot,
        null,
        error
      );
    }
  }

  /**
   * Move the candidate into the archive.
   * @returns The destination path
   * @throws ArchiveMoveError with the source left in place
   */
  async archive(candidate: CandidateFile): Promise<string> {
    const logger = createChildLogger({ filePath: candidate.path });
    const target = join(this.archiveRoot, candidate.relativePath);

    try {
      await mkdir(dirname(target), { recursive: true });
    } catch (error) {
      throw new ArchiveMoveError(
        `Cannot create archive directory ${dirname(target)}: ${errorMessage(error)}`,
        candidate.path,
        target,
        error
      );
    }

    for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
      const destination = await this.reserveDestination(target);
      if (destination !== target) {
        logger.info({ destination }, 'Archive name taken, using a suffixed name');
      }

      try {
        if (await this.move(candidate.path, destination)) {
          logger.debug({ destination }, 'File moved to archive');
          return destination;
        }
      } finally {
        this.reserved.delete(destination);
      }

      logger.info({ destination, attempt }, 'Archive name appeared during the move, picking another');
    }

    throw new ArchiveMoveError(
      `No free archive name for ${candidate.relativePath} after ${MAX_NAME_ATTEMPTS} attempts`,
      candidate.path,
      target
    );
  }

  /**
   * First name that neither exists nor is claimed by another move
   */
  private async reserveDestination(target: string): Promise<string> {
    if (await this.tryClaim(target)) {
      return target;
    }

    const extension = extname(target);
    const stem = join(dirname(target), basename(target, extension));
    const timestamp = this.now().toISOString().replace(/[:.]/g, '-');

    for (let counter = 0; ; counter++) {
      const suffix = counter === 0 ? `_${timestamp}` : `_${timestamp}-${counter}`;
      const candidatePath = `${stem}${suffix}${extension}`;
      if (await this.tryClaim(candidatePath)) {
        return candidatePath;
      }
    }
  }

  /**
   * Claim `path` if nothing exists there and no other move holds it. The
   * reservation check runs after the await so two moves cannot both win.
   */
  private async tryClaim(path: string): Promise<boolean> {
    if (this.reserved.has(path) || await this.exists(path) || this.reserved.has(path)) {
      return false;
    }
    this.reserved.add(path);
    return true;
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await access(path, constants.F_OK);
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw new ArchiveMoveError(`Cannot inspect archive path ${path}: ${errorMessage(error)}`, path, path, error);
    }
  }

  /**
   * Link the file under its archive name, then drop the original name.
   * link(2) fails instead of replacing an existing entry.
   * @returns false when something else created `destination` first
   */
  private async move(source: string, destination: string): Promise<boolean> {
    try {
      await this.ops.link(source, destination);
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      if (hasErrorCode(error, ...NO_HARD_LINK)) {
        // Different volume or no hard links: copy, confirm, then remove the original
        return this.copyVerifyDelete(source, destination);
      }
      throw new ArchiveMoveError(`Cannot move file to archive: ${errorMessage(error)}`, source, destination, error);
    }

    try {
      await this.ops.unlink(source);
    } catch (error) {
      // Already gone: the archive entry is now the only name of the file
      if (hasErrorCode(error, 'ENOENT')) {
        return true;
      }
      await this.discardDestination(destination);
      throw new ArchiveMoveError(
        `Cannot remove the original after linking it into the archive: ${errorMessage(error)}`,
        source,
        destination,
        error
      );
    }
    return true;
  }

  private async copyVerifyDelete(source: string, destination: string): Promise<boolean> {
    try {
      await this.ops.copyFile(source, destination, constants.COPYFILE_EXCL);
    } catch (error) {
      // EEXIST means the name was taken by someone else; anything else may leave a partial copy
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      await this.discardDestination(destination);
      throw new ArchiveMoveError(`Cross-volume archive copy failed: ${errorMessage(error)}`, source, destination, error);
    }

    try {
      const [sourceStats, copyStats] = await Promise.all([stat(source), stat(destination)]);
      if (sourceStats.size !== copyStats.size) {
        throw new Error(`copy has ${copyStats.size} bytes, source has ${sourceStats.size}`);
      }

      await this.ops.unlink(source);
    } catch (error) {
      await this.discardDestination(destination);
      throw new ArchiveMoveError(
        `Cross-volume archive move could not be completed: ${errorMessage(error)}`,
        source,
        destination,
        error
      );
    }
    return true;
  }

  private async discardDestination(destination: string): Promise<void> {
    try {
      await unlink(destination);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        createChildLogger({ destination }).error({ error }, 'Could not remove archive entry of a failed move');
      }
    }
  }
}
