import { ProfileConsts } from "../profile/consts.js";
import { locateField, mergeProfile, profileFromBytes, profileToBytes } from "../profile/layout.js";
import type { PartialProfile } from "../profile/types.js";
import { OutOfRangeError, ProfileError, ProtocolError, TransportError } from "../protocol/errors.js";
import { assertFrameOk, decodeFrame, encodeFrame, type Frame, FrameConsts, ProfileCommand } from "../protocol/frame.js";
import { logger, toHex } from "../utils/logger.js";

const NS = "transfer-planner";

/**
 * Half-duplex request/response link to the device.
 * Exactly one exchange is outstanding at any time.
 */
export interface ProfileTransport {
    /**
     * Send one 17-byte frame and resolve with the 17-byte response.
     * Must reject with a `TransportError` when no (complete) response arrives within `timeoutMs`.
     */
    exchange(frame: Buffer, timeoutMs: number): Promise<Buffer>;
}

/**
 * - full: every window of the merged profile is written
 * - changed: only the windows whose bytes differ from what was read
 */
export type PartialWriteMode = "full" | "changed";

export type TransferOptions = {
    /** Per-exchange timeout passed to the transport. Default: 1000 */
    timeoutMs: number;
    /** Extra attempts for a frame that failed with a recoverable `TransportError`. Default: 1 */
    retries: number;
    /** Default: "full" */
    partialWrite: PartialWriteMode;
    /** Called after every profile data frame with the bytes transferred so far */
    onProgress?: (done: number, total: number) => void;
};

export const DEFAULT_TRANSFER_OPTIONS: Readonly<TransferOptions> = Object.freeze({
    timeoutMs: 1000,
    retries: 1,
    partialWrite: "full",
});

export type TransferState = "idle" | "reading" | "merging" | "writing";

export const enum TransferConsts {
    /** ceil(0x1b00 / 10), also the read loop guard */
    FRAME_COUNT = 692,
}

function hex16(value: number): string {
    return value.toString(16).padStart(4, "0");
}

/** `0x0123 (keyCombos[0])` */
function describeAddress(address: number): string {
    const entry = locateField(address);

    return entry === undefined ? `0x${hex16(address)}` : `0x${hex16(address)} (${entry.field})`;
}

/**
 * Splits the 0x1b00-byte active profile into frames and drives them through a `ProfileTransport`.
 *
 * Operations are serialized: a call issued while another is in flight waits for it to settle.
 * A failed operation never yields a partial profile; an interrupted write leaves the device partially updated.
 */
export class TransferPlanner {
    readonly #transport: ProfileTransport;
    readonly #options: TransferOptions;
    #state: TransferState;
    #queue: Promise<void>;

    constructor(transport: ProfileTransport, options: Partial<TransferOptions> = {}) {
        this.#transport = transport;
        this.#options = { ...DEFAULT_TRANSFER_OPTIONS, ...options };
        this.#state = "idle";
        this.#queue = Promise.resolve();

        if (!Number.isInteger(this.#options.retries) || this.#options.retries < 0) {
            throw new OutOfRangeError("retries", this.#options.retries);
        }

        if (!(this.#options.timeoutMs > 0)) {
            throw new OutOfRangeError("timeoutMs", this.#options.timeoutMs);
        }
    }

    // #region Getters/Setters

    get state(): TransferState {
        return this.#state;
    }

    get options(): Readonly<TransferOptions> {
        return this.#options;
    }

    // #endregion

    // #region Exchange

    async #serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.#queue.then(task);
        // the chain only orders operations, outcomes reach the caller through `run`
        this.#queue = run.then(
            () => undefined,
            () => undefined,
        );

        return await run;
    }

    async #exchangeOnce(request: Buffer): Promise<Buffer> {
        try {
            return await this.#transport.exchange(request, this.#options.timeoutMs);
        } catch (error) {
            if (error instanceof ProfileError) {
                throw error;
            }

            throw new TransportError(`Exchange failed: ${error instanceof Error ? error.message : String(error)}`, false, { cause: error });
        }
    }

    /**
     * Send one request frame, retrying recoverable transport failures, and validate the response.
     * @param expectedAddress checked against the response when defined
     */
    async #request(command: ProfileCommand, address: number, payload: Buffer, expectedAddress?: number): Promise<Frame> {
        const request = encodeFrame(command, 0, address, payload);

        for (let attempt = 0; ; attempt++) {
            logger.debug(() => `---> FRAME[${toHex(request)}]`, NS);

            let raw: Buffer;

            try {
                raw = await this.#exchangeOnce(request);
            } catch (error) {
                if (error instanceof TransportError && error.recoverable && attempt < this.#options.retries) {
                    logger.warning(
                        `-x-> FRAME[cmd=0x${command.toString(16)} address=${describeAddress(address)}] ${error.message}, retrying (${attempt + 1}/${this.#options.retries})`,
                        NS,
                    );
                    continue;
                }

                throw error;
            }

            logger.debug(() => `<--- FRAME[${toHex(raw)}]`, NS);

            const response = decodeFrame(raw);

            assertFrameOk(response);

            if (response.command !== command) {
                throw new ProtocolError(`Unexpected response command 0x${response.command.toString(16)} to 0x${command.toString(16)}`);
            }

            if (expectedAddress !== undefined && response.address !== expectedAddress) {
                throw new ProtocolError(`Unexpected response address 0x${hex16(response.address)}, expected ${describeAddress(expectedAddress)}`);
            }

            return response;
        }
    }

    // #endregion

    // #region Profile data

    async #read(): Promise<Buffer> {
        const blob = Buffer.alloc(ProfileConsts.SIZE);
        let address = 0;
        let iterations = 0;

        while (address < ProfileConsts.SIZE) {
            if (iterations++ >= TransferConsts.FRAME_COUNT) {
                throw new ProtocolError(`Read did not complete within ${TransferConsts.FRAME_COUNT} frames (stopped at ${describeAddress(address)})`);
            }

            const requested = Math.min(FrameConsts.MAX_PAYLOAD, ProfileConsts.SIZE - address);
            const response = await this.#request(ProfileCommand.GET_PROFILE_DATA, address, Buffer.alloc(requested), address);

            if (response.payload.byteLength > requested) {
                throw new ProtocolError(`Response at ${describeAddress(address)} returned ${response.payload.byteLength} bytes, requested ${requested}`);
            }

            blob.set(response.payload, address);

            address += response.payload.byteLength;

            this.#options.onProgress?.(address, ProfileConsts.SIZE);
        }

        return blob;
    }

    /**
     * @param windows start addresses to write, every window is (up to) 10 bytes
     */
    async #write(blob: Buffer, windows: readonly number[]): Promise<void> {
        const total = windows.reduce((sum, address) => sum + Math.min(FrameConsts.MAX_PAYLOAD, ProfileConsts.SIZE - address), 0);
        let done = 0;

        for (const address of windows) {
            const chunk = blob.subarray(address, Math.min(address + FrameConsts.MAX_PAYLOAD, ProfileConsts.SIZE));

            await this.#request(ProfileCommand.SET_PROFILE_DATA, address, chunk, address);

            done += chunk.byteLength;

            this.#options.onProgress?.(done, total);
        }
    }

    #assertProfileSize(blob: Buffer): void {
        if (blob.byteLength !== ProfileConsts.SIZE) {
            throw new ProtocolError(`Invalid profile size ${blob.byteLength}, expected ${ProfileConsts.SIZE}`);
        }
    }

    /**
     * Read the whole active profile.
     * @returns 0x1b00 bytes, never partial
     */
    public async readProfile(): Promise<Buffer> {
        return await this.#serialize(async () => {
            this.#state = "reading";

            try {
                return await this.#read();
            } finally {
                this.#state = "idle";
            }
        });
    }

    /**
     * Write a whole 0x1b00-byte profile to the active profile, 692 frames at addresses 0, 10, ..., 6910.
     */
    public async writeProfile(blob: Buffer): Promise<void> {
        this.#assertProfileSize(blob);

        await this.#serialize(async () => {
            this.#state = "writing";

            try {
                await this.#write(blob, allWindows());
            } finally {
                this.#state = "idle";
            }
        });
    }

    /**
     * Read the active profile, overlay `patch`, write the result back.
     * Nothing is written when reading, decoding or merging fails.
     * @returns the merged profile bytes as written
     */
    public async writePartial(patch: PartialProfile): Promise<Buffer> {
        return await this.#serialize(async () => {
            try {
                this.#state = "reading";
                const current = await this.#read();

                this.#state = "merging";
                const merged = profileToBytes(mergeProfile(profileFromBytes(current), patch));

                this.#state = "writing";
                const windows = this.#options.partialWrite === "changed" ? changedWindows(current, merged) : allWindows();

                logger.debug(() => `Writing ${windows.length}/${TransferConsts.FRAME_COUNT} frames (${this.#options.partialWrite})`, NS);

                await this.#write(merged, windows);

                return merged;
            } finally {
                this.#state = "idle";
            }
        });
    }

    // #endregion

    // #region Active profile

    /**
     * @returns index of the active profile, 0-3
     */
    public async getActiveProfile(): Promise<number> {
        return await this.#serialize(async () => {
            const response = await this.#request(ProfileCommand.GET_ACTIVE_PROFILE, 0, Buffer.alloc(0));

            if (response.payload.byteLength < 1) {
                throw new ProtocolError("Empty active profile response");
            }

            const index = response.payload.readUInt8(0);

            if (index >= ProfileConsts.STORED_PROFILES) {
                throw new OutOfRangeError("activeProfile", index);
            }

            return index;
        });
    }

    /**
     * @param index 0-3
     */
    public async setActiveProfile(index: number): Promise<void> {
        if (!Number.isInteger(index) || index < 0 || index >= ProfileConsts.STORED_PROFILES) {
            throw new OutOfRangeError("activeProfile", index);
        }

        await this.#serialize(async () => {
            await this.#request(ProfileCommand.SET_ACTIVE_PROFILE, 0, Buffer.from([index]));
            logger.info(`Active profile set to ${index}`, NS);
        });
    }

    // #endregion
}

function allWindows(): number[] {
    return Array.from({ length: TransferConsts.FRAME_COUNT }, (_, i) => i * FrameConsts.MAX_PAYLOAD);
}

function changedWindows(before: Buffer, after: Buffer): number[] {
    return allWindows().filter((address) => {
        const end = Math.min(address + FrameConsts.MAX_PAYLOAD, ProfileConsts.SIZE);

        return !before.subarray(address, end).equals(after.subarray(address, end));
    });
}
