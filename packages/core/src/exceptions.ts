// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Typed error hierarchy for LanWake. */

export type WakeErrorKind = "InvalidMacLength" | "InvalidMacFormat" | "SendFailure" | "Configuration";

export class WakeError extends Error {
  constructor(
    message: string,
    public readonly kind: WakeErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WakeError";
  }
}

export class InvalidMacLengthError extends WakeError {
  constructor(
    public readonly length: number,
    public readonly expected: number,
  ) {
    super(`Invalid MAC address length: expected ${expected}, got ${length}`, "InvalidMacLength");
    this.name = "InvalidMacLengthError";
  }
}

export class InvalidMacFormatError extends WakeError {
  constructor(
    public readonly input: string,
    reason?: string,
  ) {
    super(`Invalid MAC address format: "${input}"${reason ? ` (${reason})` : ""}`, "InvalidMacFormat");
    this.name = "InvalidMacFormatError";
  }
}

/** Where in the send sequence the transport failed. */
export type SendStage = "bind" | "broadcast" | "send";

export class SendFailureError extends WakeError {
  constructor(
    public readonly stage: SendStage,
    cause: unknown,
  ) {
    super(`Couldn't send WoL packet (${stage}): ${describeCause(cause)}`, "SendFailure", { cause });
    this.name = "SendFailureError";
  }
}

export class ConfigurationError extends WakeError {
  constructor(message: string) {
    super(message, "Configuration");
    this.name = "ConfigurationError";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
