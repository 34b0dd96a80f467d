import { ChecksumSeed, checksum } from "../protocol/checksum.js";
import { ChecksumMismatchError, CountOutOfRangeError, InvalidFlagsError, InvalidValueError, OutOfRangeError } from "../protocol/errors.js";
import { ProfileConsts } from "./consts.js";
import { assertRange } from "./fields.js";
import type { KeyCombo, KeyData, KeyEvent, KeyState, Macro, MacroEvent } from "./types.js";

/**
 * Key event flags byte:
 *
 *   7   6   5   4   3   2   1   0
 * +---+---+---+---+---+---+---+---+
 * | P | R |  reserved | D | C | H |
 * +---+---+---+---+---+---+---+---+
 *
 * P/R: press/release, exactly one set.
 * H/C/D: selector for the 2-byte (LE) key data: HID keycode, consumer code, direction mask.
 * No selector bit means the key data is a modifier mask. Selectors are mutually exclusive.
 */
export const enum KeyEventFlag {
    HID = 0x01,
    CONSUMER = 0x02,
    DIRECTION = 0x04,
    RELEASE = 0x40,
    PRESS = 0x80,
}

const KEY_EVENT_SELECTOR_MASK = KeyEventFlag.HID | KeyEventFlag.CONSUMER | KeyEventFlag.DIRECTION;
const KEY_EVENT_STATE_MASK = KeyEventFlag.PRESS | KeyEventFlag.RELEASE;
const DIRECTION_MASK = 0x1f;

export const enum MacroConsts {
    KEY_EVENT_SIZE = 3,
    /** key event + uint16_t BE delay */
    MACRO_EVENT_SIZE = 5,

    /**
     * count (1) + 6 events (18) + checksum (1) + padding (12)
     */
    COMBO_OFFSET_EVENTS = 1,
    COMBO_OFFSET_CHECKSUM = 19,

    /**
     * name length (1) + name (30) + count (1) + 70 events (350) + checksum (1) + padding (1)
     */
    MACRO_OFFSET_NAME = 1,
    MACRO_OFFSET_COUNT = 31,
    MACRO_OFFSET_EVENTS = 32,
    MACRO_OFFSET_CHECKSUM = 382,
}

export type RawKeyEvent = {
    flags: number;
    /** uint16_t */
    data: number;
};

/**
 * Split a flags byte into its state and key data interpretation.
 * Ambiguous combinations are rejected instead of guessing a precedence.
 */
export function parseKeyEventFlags(flags: number, context: string): { state: KeyState; kind: KeyData["kind"] } {
    if ((flags & ~(KEY_EVENT_SELECTOR_MASK | KEY_EVENT_STATE_MASK) & 0xff) !== 0) {
        throw new InvalidFlagsError(context, flags);
    }

    const stateBits = flags & KEY_EVENT_STATE_MASK;

    if (stateBits !== KeyEventFlag.PRESS && stateBits !== KeyEventFlag.RELEASE) {
        throw new InvalidFlagsError(context, flags);
    }

    const state: KeyState = stateBits === KeyEventFlag.PRESS ? "press" : "release";

    switch (flags & KEY_EVENT_SELECTOR_MASK) {
        case 0:
            return { state, kind: "modifier" };
        case KeyEventFlag.HID:
            return { state, kind: "hid" };
        case KeyEventFlag.CONSUMER:
            return { state, kind: "consumer" };
        case KeyEventFlag.DIRECTION:
            return { state, kind: "direction" };
        default:
            throw new InvalidFlagsError(context, flags);
    }
}

export function keyEventFlags(event: KeyEvent): number {
    const state = event.state === "press" ? KeyEventFlag.PRESS : KeyEventFlag.RELEASE;

    switch (event.key.kind) {
        case "modifier":
            return state;
        case "hid":
            return state | KeyEventFlag.HID;
        case "consumer":
            return state | KeyEventFlag.CONSUMER;
        case "direction":
            return state | KeyEventFlag.DIRECTION;
    }
}

function keyDataValue(key: KeyData): number {
    switch (key.kind) {
        case "modifier":
        case "direction":
            return key.mask;
        case "hid":
        case "consumer":
            return key.code;
    }
}

function toKeyData(kind: KeyData["kind"], value: number, context: string): KeyData {
    switch (kind) {
        case "modifier":
            return { kind, mask: value };
        case "hid":
            return { kind, code: value };
        case "consumer":
            return { kind, code: value };
        case "direction": {
            assertDirection(value, context);

            return { kind, mask: value };
        }
    }
}

/** Pointer direction is a single bit: 1=left, 2=right, 4=middle, 8=back, 16=forward */
function assertDirection(mask: number, context: string): void {
    if (mask === 0 || (mask & ~DIRECTION_MASK) !== 0 || (mask & (mask - 1)) !== 0) {
        throw new OutOfRangeError(`${context}.direction`, mask);
    }
}

/**
 * Encode flags + data as given, rejecting flag combinations the format cannot express.
 */
export function encodeRawKeyEvent(event: RawKeyEvent, context = "keyEvent"): Buffer {
    const { kind } = parseKeyEventFlags(event.flags, context);

    assertRange(`${context}.data`, event.data, 0, 0xffff);

    if (kind === "direction") {
        assertDirection(event.data, context);
    }

    const buffer = Buffer.alloc(MacroConsts.KEY_EVENT_SIZE);
    buffer.writeUInt8(event.flags, 0);
    buffer.writeUInt16LE(event.data, 1);

    return buffer;
}

export function encodeKeyEvent(event: KeyEvent, context = "keyEvent"): Buffer {
    return encodeRawKeyEvent({ flags: keyEventFlags(event), data: keyDataValue(event.key) }, context);
}

export function decodeKeyEvent(data: Buffer, offset: number, context = "keyEvent"): KeyEvent {
    const { state, kind } = parseKeyEventFlags(data.readUInt8(offset), context);

    return { state, key: toKeyData(kind, data.readUInt16LE(offset + 1), context) };
}

export function encodeMacroEvent(event: MacroEvent, context = "macroEvent"): Buffer {
    assertRange(`${context}.delayMs`, event.delayMs, 0, 0xffff);

    const buffer = Buffer.alloc(MacroConsts.MACRO_EVENT_SIZE);
    buffer.set(encodeKeyEvent(event, context), 0);
    buffer.writeUInt16BE(event.delayMs, MacroConsts.KEY_EVENT_SIZE);

    return buffer;
}

export function decodeMacroEvent(data: Buffer, offset: number, context = "macroEvent"): MacroEvent {
    const { state, key } = decodeKeyEvent(data, offset, context);

    return { state, key, delayMs: data.readUInt16BE(offset + MacroConsts.KEY_EVENT_SIZE) };
}

/** Erased slots are all zero (a valid empty block still carries a checksum) */
function isErased(slot: Buffer): boolean {
    return slot.every((byte) => byte === 0);
}

/**
 * @returns 32 bytes, all zero for `null`
 */
export function encodeKeyCombo(combo: KeyCombo | null, context = "keyCombo"): Buffer {
    const slot = Buffer.alloc(ProfileConsts.KEY_COMBO_SLOT_SIZE);

    if (combo === null) {
        return slot;
    }

    if (combo.events.length > ProfileConsts.KEY_COMBO_MAX_EVENTS) {
        throw new CountOutOfRangeError(`${context}.events`, combo.events.length, ProfileConsts.KEY_COMBO_MAX_EVENTS);
    }

    slot.writeUInt8(combo.events.length, 0);

    for (let i = 0; i < combo.events.length; i++) {
        slot.set(encodeKeyEvent(combo.events[i], `${context}.events[${i}]`), MacroConsts.COMBO_OFFSET_EVENTS + i * MacroConsts.KEY_EVENT_SIZE);
    }

    slot.writeUInt8(checksum(slot, ChecksumSeed.MACRO, 0, MacroConsts.COMBO_OFFSET_CHECKSUM), MacroConsts.COMBO_OFFSET_CHECKSUM);

    return slot;
}

export function decodeKeyCombo(slot: Buffer, context = "keyCombo"): KeyCombo | null {
    if (isErased(slot)) {
        return null;
    }

    const count = slot.readUInt8(0);

    if (count > ProfileConsts.KEY_COMBO_MAX_EVENTS) {
        throw new CountOutOfRangeError(`${context}.events`, count, ProfileConsts.KEY_COMBO_MAX_EVENTS);
    }

    const expected = checksum(slot, ChecksumSeed.MACRO, 0, MacroConsts.COMBO_OFFSET_CHECKSUM);
    const actual = slot.readUInt8(MacroConsts.COMBO_OFFSET_CHECKSUM);

    if (expected !== actual) {
        throw new ChecksumMismatchError(context, expected, actual);
    }

    const events: KeyEvent[] = [];

    for (let i = 0; i < count; i++) {
        events.push(decodeKeyEvent(slot, MacroConsts.COMBO_OFFSET_EVENTS + i * MacroConsts.KEY_EVENT_SIZE, `${context}.events[${i}]`));
    }

    return { events };
}

/**
 * Truncate UTF-8 to `maxBytes` without splitting a multi-byte sequence.
 */
function encodeMacroName(name: string): Buffer {
    const bytes = Buffer.from(name, "utf8");

    if (bytes.byteLength <= ProfileConsts.MACRO_MAX_NAME_LENGTH) {
        return bytes;
    }

    let end = ProfileConsts.MACRO_MAX_NAME_LENGTH;

    // back off continuation bytes (0b10xxxxxx)
    while (end > 0 && (bytes[end] & 0xc0) === 0x80) {
        end--;
    }

    return bytes.subarray(0, end);
}

// keeps a leading BOM, names must re-encode byte for byte
const NAME_DECODER = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Strict UTF-8: invalid sequences throw instead of decoding to U+FFFD.
 */
function decodeMacroName(bytes: Buffer, context: string): string {
    try {
        return NAME_DECODER.decode(bytes);
    } catch (error) {
        if (error instanceof TypeError) {
            throw new InvalidValueError(`${context}.name`, "UTF-8 text");
        }

        throw error;
    }
}

/**
 * @returns 384 bytes, all zero for `null`
 */
export function encodeMacro(macro: Macro | null, context = "macro"): Buffer {
    const slot = Buffer.alloc(ProfileConsts.MACRO_SLOT_SIZE);

    if (macro === null) {
        return slot;
    }

    if (macro.events.length > ProfileConsts.MACRO_MAX_EVENTS) {
        throw new CountOutOfRangeError(`${context}.events`, macro.events.length, ProfileConsts.MACRO_MAX_EVENTS);
    }

    const name = encodeMacroName(macro.name);

    slot.writeUInt8(name.byteLength, 0);
    slot.set(name, MacroConsts.MACRO_OFFSET_NAME);
    slot.writeUInt8(macro.events.length, MacroConsts.MACRO_OFFSET_COUNT);

    for (let i = 0; i < macro.events.length; i++) {
        slot.set(encodeMacroEvent(macro.events[i], `${context}.events[${i}]`), MacroConsts.MACRO_OFFSET_EVENTS + i * MacroConsts.MACRO_EVENT_SIZE);
    }

    slot.writeUInt8(checksum(slot, ChecksumSeed.MACRO, 0, MacroConsts.MACRO_OFFSET_CHECKSUM), MacroConsts.MACRO_OFFSET_CHECKSUM);

    return slot;
}

export function decodeMacro(slot: Buffer, context = "macro"): Macro | null {
    if (isErased(slot)) {
        return null;
    }

    const nameLength = slot.readUInt8(0);

    if (nameLength > ProfileConsts.MACRO_MAX_NAME_LENGTH) {
        throw new CountOutOfRangeError(`${context}.name`, nameLength, ProfileConsts.MACRO_MAX_NAME_LENGTH);
    }

    const count = slot.readUInt8(MacroConsts.MACRO_OFFSET_COUNT);

    if (count > ProfileConsts.MACRO_MAX_EVENTS) {
        throw new CountOutOfRangeError(`${context}.events`, count, ProfileConsts.MACRO_MAX_EVENTS);
    }

    const expected = checksum(slot, ChecksumSeed.MACRO, 0, MacroConsts.MACRO_OFFSET_CHECKSUM);
    const actual = slot.readUInt8(MacroConsts.MACRO_OFFSET_CHECKSUM);

    if (expected !== actual) {
        throw new ChecksumMismatchError(context, expected, actual);
    }

    const events: MacroEvent[] = [];

    for (let i = 0; i < count; i++) {
        events.push(decodeMacroEvent(slot, MacroConsts.MACRO_OFFSET_EVENTS + i * MacroConsts.MACRO_EVENT_SIZE, `${context}.events[${i}]`));
    }

    return {
        name: decodeMacroName(slot.subarray(MacroConsts.MACRO_OFFSET_NAME, MacroConsts.MACRO_OFFSET_NAME + nameLength), context),
        events,
    };
}
