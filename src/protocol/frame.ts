import { isMacroRegion } from "../profile/consts.js";
import { ChecksumSeed, checksum } from "./checksum.js";
import { ChecksumMismatchError, DeviceError, ProtocolError } from "./errors.js";

/**
 * Vendor report (id 0x08), 17 bytes including report id:
 *
 * +-----------+-----+-------+---------+-----+------------+----------+
 * | report id | cmd | error | address | len |  payload   | checksum |
 * |     1     |  1  |   1   |  2 (BE) |  1  | 10 (zero-  |    1     |
 * |           |     |       |         |     |  padded)   |          |
 * +-----------+-----+-------+---------+-----+------------+----------+
 *
 * The checksum covers cmd..payload (bytes 1-15), the report id is not summed.
 */
export const enum FrameConsts {
    SIZE = 17,
    REPORT_ID = 0x08,
    MAX_PAYLOAD = 10,

    OFFSET_COMMAND = 1,
    OFFSET_ERROR = 2,
    OFFSET_ADDRESS = 3,
    OFFSET_LENGTH = 5,
    OFFSET_PAYLOAD = 6,
    OFFSET_CHECKSUM = 16,
}

export const enum ProfileCommand {
    /** Write profile data to address within active profile */
    SET_PROFILE_DATA = 0x07,
    /** Read profile data from address within active profile */
    GET_PROFILE_DATA = 0x08,
    /** Read index of active profile */
    GET_ACTIVE_PROFILE = 0x0e,
    /** Write index of active profile */
    SET_ACTIVE_PROFILE = 0x0f,
}

export type Frame = {
    command: number;
    /** 0 = OK */
    error: number;
    /** uint16_t */
    address: number;
    /** up to 10 bytes, length is implied */
    payload: Buffer;
};

/** Frames addressing the key combo/macro regions are checksummed with the macro seed */
export function frameChecksumSeed(address: number): ChecksumSeed {
    return isMacroRegion(address) ? ChecksumSeed.MACRO : ChecksumSeed.SETTING;
}

function isUInt(value: number, max: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= max;
}

export function encodeFrame(command: number, error: number, address: number, payload: Uint8Array): Buffer {
    if (payload.byteLength > FrameConsts.MAX_PAYLOAD) {
        throw new ProtocolError(`Frame payload too long (${payload.byteLength} > ${FrameConsts.MAX_PAYLOAD})`);
    }

    if (!isUInt(command, 0xff)) {
        throw new ProtocolError(`Frame command out of range (${command})`);
    }

    if (!isUInt(error, 0xff)) {
        throw new ProtocolError(`Frame error code out of range (${error})`);
    }

    if (!isUInt(address, 0xffff)) {
        throw new ProtocolError(`Frame address out of range (${address})`);
    }

    const frame = Buffer.alloc(FrameConsts.SIZE);
    frame.writeUInt8(FrameConsts.REPORT_ID, 0);
    frame.writeUInt8(command, FrameConsts.OFFSET_COMMAND);
    frame.writeUInt8(error, FrameConsts.OFFSET_ERROR);
    frame.writeUInt16BE(address, FrameConsts.OFFSET_ADDRESS);
    frame.writeUInt8(payload.byteLength, FrameConsts.OFFSET_LENGTH);
    frame.set(payload, FrameConsts.OFFSET_PAYLOAD);
    frame.writeUInt8(checksum(frame, frameChecksumSeed(address), FrameConsts.OFFSET_COMMAND, FrameConsts.OFFSET_CHECKSUM), FrameConsts.OFFSET_CHECKSUM);

    return frame;
}

/**
 * Parse a 17-byte report.
 * A non-zero error code is NOT a decode failure, it is returned as a field (@see assertFrameOk).
 */
export function decodeFrame(raw: Buffer): Frame {
    if (raw.byteLength !== FrameConsts.SIZE) {
        throw new ProtocolError(`Invalid frame size ${raw.byteLength}, expected ${FrameConsts.SIZE}`);
    }

    if (raw[0] !== FrameConsts.REPORT_ID) {
        throw new ProtocolError(`Unexpected report id ${raw[0]}`);
    }

    const length = raw.readUInt8(FrameConsts.OFFSET_LENGTH);

    if (length > FrameConsts.MAX_PAYLOAD) {
        throw new ProtocolError(`Invalid frame payload length ${length}`);
    }

    const address = raw.readUInt16BE(FrameConsts.OFFSET_ADDRESS);
    const expected = checksum(raw, frameChecksumSeed(address), FrameConsts.OFFSET_COMMAND, FrameConsts.OFFSET_CHECKSUM);
    const actual = raw.readUInt8(FrameConsts.OFFSET_CHECKSUM);

    if (expected !== actual) {
        throw new ChecksumMismatchError(`frame at address 0x${address.toString(16).padStart(4, "0")}`, expected, actual);
    }

    return {
        command: raw.readUInt8(FrameConsts.OFFSET_COMMAND),
        error: raw.readUInt8(FrameConsts.OFFSET_ERROR),
        address,
        // copy, caller may reuse the receive buffer
        payload: Buffer.from(raw.subarray(FrameConsts.OFFSET_PAYLOAD, FrameConsts.OFFSET_PAYLOAD + length)),
    };
}

export function assertFrameOk(frame: Frame): void {
    if (frame.error !== 0) {
        throw new DeviceError(frame.error, frame.command, frame.address);
    }
}
