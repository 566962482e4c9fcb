/**
 * Fatal error types. Anything thrown from here aborts the run before a
 * snapshot or document is written.
 */

import { ExitCodes, type ExitCode, type Identifier, type Location } from "./models.js";

export class WaymarkError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = ExitCodes.FAILURE) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/**
 * Two documents claim the same identifier.
 */
export class IdentifierCollisionError extends WaymarkError {
  constructor(
    readonly identifier: Identifier,
    readonly existing: Location,
    readonly conflicting: Location,
  ) {
    super(
      `Identifier '${identifier}' is claimed by both ${existing} and ${conflicting}`,
      ExitCodes.DATA_ERROR,
    );
  }
}

/**
 * The before-snapshot does not exist. `waymark prepare` was never run or
 * its artifact was removed.
 */
export class SnapshotMissingError extends WaymarkError {
  constructor(readonly snapshotPath: string) {
    super(
      `Snapshot not found at ${snapshotPath}. Run "waymark prepare" first.`,
      ExitCodes.DATA_ERROR,
    );
  }
}

export class SnapshotCorruptError extends WaymarkError {
  constructor(
    readonly snapshotPath: string,
    readonly reason: string,
  ) {
    super(`Snapshot at ${snapshotPath} is unreadable: ${reason}`, ExitCodes.DATA_ERROR);
  }
}

/**
 * An identifier -> location mapping is not a bijection, or derived redirect
 * rules contradict each other.
 */
export class ConsistencyError extends WaymarkError {
  constructor(message: string) {
    super(message, ExitCodes.DATA_ERROR);
  }
}

export class ConfigError extends WaymarkError {
  constructor(message: string) {
    super(message, ExitCodes.USAGE_ERROR);
  }
}
