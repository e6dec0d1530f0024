/**
 * Robot Link error taxonomy
 *
 * Errors local to one loop iteration of a channel worker are absorbed by that worker.
 * Errors that break a call in progress reach the caller as one of these classes.
 */

export class RobotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport lost while sending, or while waiting for a command response. */
export class DisconnectedError extends RobotError {}

/** No camera frame arrived within the image wait window. */
export class NoImageError extends RobotError {}

/** A receive failed on a channel; the owning worker turns this into loss counting or a reset. */
export class ReceiveError extends RobotError {}

/** The initial handshake on a channel failed. Fatal for the program. */
export class ConnectionFailedError extends RobotError {}

export class InvalidSoundFileError extends RobotError {}

export class InvalidImageFileError extends RobotError {}

/** Raised for `status: "error"` responses when strict command handling is on. */
export class CommandRejectedError extends RobotError {
  constructor(
    readonly commandId: string,
    readonly reason: string,
  ) {
    super(`robot rejected ${commandId}: ${reason}`);
  }
}

/** A blocking wait was interrupted because the program is shutting down. */
export class CancelledError extends RobotError {}
