/**
 * Error taxonomy shared by every layer.
 *
 * Codec errors (checksum, range, count, flags) are raised while decoding/encoding single fields.
 * Frame-level and transfer-level errors (device, transport, protocol) abort a whole read/write sequence.
 */
export class ProfileError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class ChecksumMismatchError extends ProfileError {
    constructor(
        public readonly context: string,
        public readonly expected: number,
        public readonly actual: number,
    ) {
        super(`Checksum mismatch in ${context} (expected=0x${hex8(expected)} actual=0x${hex8(actual)})`);
    }
}

export class OutOfRangeError extends ProfileError {
    constructor(
        public readonly field: string,
        public readonly value: number,
    ) {
        super(`Value ${value} out of range for ${field}`);
    }
}

export class CountOutOfRangeError extends ProfileError {
    constructor(
        public readonly field: string,
        public readonly value: number,
        public readonly max: number,
    ) {
        super(`Count ${value} for ${field} exceeds maximum ${max}`);
    }
}

/** A value of the wrong shape: malformed input, a raw slot where a decoded value is required, undecodable text... */
export class InvalidValueError extends ProfileError {
    constructor(
        public readonly field: string,
        public readonly expected: string,
    ) {
        super(`Invalid ${field}, expected ${expected}`);
    }
}

export class InvalidFlagsError extends ProfileError {
    constructor(
        public readonly context: string,
        public readonly flags: number,
    ) {
        super(`Invalid flags 0x${hex8(flags)} in ${context}`);
    }
}

/** The device answered with a non-zero error code. */
export class DeviceError extends ProfileError {
    constructor(
        public readonly code: number,
        public readonly command: number,
        public readonly address: number,
    ) {
        super(`Device error code=${code} (cmd=0x${hex8(command)} address=0x${address.toString(16).padStart(4, "0")})`);
    }
}

/**
 * Failure of the underlying exchange (no response, short read, closed handle...).
 * Only `recoverable` failures are retried, and only for the frame that failed.
 */
export class TransportError extends ProfileError {
    constructor(
        message: string,
        public readonly recoverable: boolean,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

/** Invariant violation: malformed frame, unexpected response, address overrun, loop guard... */
export class ProtocolError extends ProfileError {}

/** Decoding the profile blob failed at a specific field; the field error is the `cause`. */
export class LayoutError extends ProfileError {
    constructor(
        public readonly field: string,
        public readonly offset: number,
        cause: unknown,
    ) {
        super(`Failed to decode ${field} at offset 0x${offset.toString(16).padStart(4, "0")}: ${cause instanceof Error ? cause.message : String(cause)}`, {
            cause,
        });
    }
}

function hex8(value: number): string {
    return value.toString(16).padStart(2, "0");
}
