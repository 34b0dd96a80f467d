import { ChecksumSeed, checksum } from "../protocol/checksum.js";
import { ChecksumMismatchError, OutOfRangeError } from "../protocol/errors.js";
import type { ButtonAction, Color, DpiPreset, LiftOffDistance, ReportRate } from "./types.js";

/**
 * Settings of the 0x0000-0x00ff region: data bytes followed by a trailing sum complement checksum (seed 171).
 * `encode*` return the full slot (data ++ checksum), `decode*` take the full slot.
 */
export const enum FieldConsts {
    /** data + checksum */
    U8_SETTING_SIZE = 2,
    /** 3 data bytes + checksum */
    GROUP_SETTING_SIZE = 4,

    DPI_STEP = 50,
    DPI_MIN = 50,
    DPI_MAX = 12800,

    FIRE_INTERVAL_MIN = 10,
    FIRE_INTERVAL_MAX = 255,
    FIRE_REPEAT_MAX = 3,
    MACRO_INDEX_MAX = 15,
    DPI_LOCK_STEP_MIN = 1,
    DPI_LOCK_STEP_MAX = 0x17,

    DEBOUNCE_MAX_MS = 15,
    PEAK_PERFORMANCE_TIME_UNIT = 10,
}

export const enum ButtonActionCode {
    DISABLED = 0x00,
    MOUSE_BUTTON = 0x01,
    DPI = 0x02,
    HORIZONTAL_SCROLL = 0x03,
    FIRE_KEY = 0x04,
    KEY_COMBO = 0x05,
    MACRO = 0x06,
    POLL_RATE_LOOP = 0x07,
    DPI_LOCK = 0x0a,
    VERTICAL_SCROLL = 0x0b,
}

const REPORT_RATE_BY_MASK: ReadonlyMap<number, ReportRate> = new Map<number, ReportRate>([
    [0x01, 1000],
    [0x02, 500],
    [0x04, 250],
    [0x08, 125],
]);
const MASK_BY_REPORT_RATE: ReadonlyMap<ReportRate, number> = new Map<ReportRate, number>(
    Array.from(REPORT_RATE_BY_MASK, ([mask, rate]): [ReportRate, number] => [rate, mask]),
);

/** [code, sub-code] for actions that carry no parameter */
const SIMPLE_ACTIONS: ReadonlyArray<readonly [ButtonAction["type"], number, number]> = [
    ["disabled", ButtonActionCode.DISABLED, 0],
    ["leftClick", ButtonActionCode.MOUSE_BUTTON, 0x01],
    ["rightClick", ButtonActionCode.MOUSE_BUTTON, 0x02],
    ["middleClick", ButtonActionCode.MOUSE_BUTTON, 0x04],
    ["backClick", ButtonActionCode.MOUSE_BUTTON, 0x08],
    ["forwardClick", ButtonActionCode.MOUSE_BUTTON, 0x10],
    ["dpiLoop", ButtonActionCode.DPI, 0x01],
    ["dpiUp", ButtonActionCode.DPI, 0x02],
    ["dpiDown", ButtonActionCode.DPI, 0x03],
    ["scrollLeft", ButtonActionCode.HORIZONTAL_SCROLL, 0x01],
    ["scrollRight", ButtonActionCode.HORIZONTAL_SCROLL, 0x02],
    ["keyCombo", ButtonActionCode.KEY_COMBO, 0],
    ["pollRateLoop", ButtonActionCode.POLL_RATE_LOOP, 0],
    ["scrollUp", ButtonActionCode.VERTICAL_SCROLL, 0x01],
    ["scrollDown", ButtonActionCode.VERTICAL_SCROLL, 0x02],
];

/** Actions whose second byte selects the variant (others ignore it) */
const SUB_CODED_ACTIONS: ReadonlySet<number> = new Set<number>([
    ButtonActionCode.MOUSE_BUTTON,
    ButtonActionCode.DPI,
    ButtonActionCode.HORIZONTAL_SCROLL,
    ButtonActionCode.VERTICAL_SCROLL,
]);

export function assertRange(field: string, value: number, min: number, max: number): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new OutOfRangeError(field, value);
    }
}

/**
 * Append the trailing checksum to setting data.
 */
export function encodeSetting(data: Uint8Array): Buffer {
    const slot = Buffer.alloc(data.byteLength + 1);

    slot.set(data, 0);
    slot[data.byteLength] = checksum(data, ChecksumSeed.SETTING);

    return slot;
}

/**
 * Validate the trailing checksum of a setting slot and return its data bytes.
 */
export function decodeSetting(slot: Buffer, field: string): Buffer {
    const dataLength = slot.byteLength - 1;
    const expected = checksum(slot, ChecksumSeed.SETTING, 0, dataLength);
    const actual = slot[dataLength];

    if (expected !== actual) {
        throw new ChecksumMismatchError(field, expected, actual);
    }

    return slot.subarray(0, dataLength);
}

export function encodeU8Setting(value: number, field: string, min = 0, max = 0xff): Buffer {
    assertRange(field, value, min, max);

    return encodeSetting(Buffer.from([value]));
}

export function decodeU8Setting(slot: Buffer, field: string, min = 0, max = 0xff): number {
    const value = decodeSetting(slot, field)[0];

    assertRange(field, value, min, max);

    return value;
}

export function encodeBoolSetting(value: boolean, field: string): Buffer {
    return encodeU8Setting(value ? 1 : 0, field);
}

/** Only 0x00 and 0x01 are legal */
export function decodeBoolSetting(slot: Buffer, field: string): boolean {
    return decodeU8Setting(slot, field, 0, 1) === 1;
}

export function encodeReportRate(rate: ReportRate, field = "reportRate"): Buffer {
    const mask = MASK_BY_REPORT_RATE.get(rate);

    if (mask === undefined) {
        throw new OutOfRangeError(field, rate);
    }

    return encodeSetting(Buffer.from([mask]));
}

/** Single-bit mask: 0x01=1000Hz, 0x02=500Hz, 0x04=250Hz, 0x08=125Hz */
export function decodeReportRate(slot: Buffer, field = "reportRate"): ReportRate {
    const mask = decodeSetting(slot, field)[0];
    const rate = REPORT_RATE_BY_MASK.get(mask);

    if (rate === undefined) {
        throw new OutOfRangeError(field, mask);
    }

    return rate;
}

export function isReportRate(value: number): value is ReportRate {
    return value === 125 || value === 250 || value === 500 || value === 1000;
}

export function encodeLiftOffDistance(value: LiftOffDistance, field = "liftOffDistance"): Buffer {
    return encodeU8Setting(value, field, 1, 2);
}

export function decodeLiftOffDistance(slot: Buffer, field = "liftOffDistance"): LiftOffDistance {
    const value = decodeSetting(slot, field)[0];

    if (value !== 1 && value !== 2) {
        throw new OutOfRangeError(field, value);
    }

    return value;
}

/** Stored in units of 10s */
export function encodePeakPerformanceTime(seconds: number, field = "peakPerformanceTime"): Buffer {
    if (seconds % FieldConsts.PEAK_PERFORMANCE_TIME_UNIT !== 0) {
        throw new OutOfRangeError(field, seconds);
    }

    return encodeU8Setting(seconds / FieldConsts.PEAK_PERFORMANCE_TIME_UNIT, field);
}

export function decodePeakPerformanceTime(slot: Buffer, field = "peakPerformanceTime"): number {
    return decodeU8Setting(slot, field) * FieldConsts.PEAK_PERFORMANCE_TIME_UNIT;
}

/**
 * DPI is stored as `dpi / 50 - 1`, so raw 0 is 50 DPI (not 0).
 */
export function dpiToRaw(dpi: number, field = "dpi"): number {
    if (dpi % FieldConsts.DPI_STEP !== 0) {
        throw new OutOfRangeError(field, dpi);
    }

    assertRange(field, dpi, FieldConsts.DPI_MIN, FieldConsts.DPI_MAX);

    return dpi / FieldConsts.DPI_STEP - 1;
}

export function dpiFromRaw(raw: number): number {
    return (raw + 1) * FieldConsts.DPI_STEP;
}

export function encodeDpiPreset(preset: DpiPreset, field = "dpiPreset"): Buffer {
    assertRange(`${field}.reserved`, preset.reserved, 0, 0xff);

    return encodeSetting(Buffer.from([dpiToRaw(preset.x, `${field}.x`), dpiToRaw(preset.y, `${field}.y`), preset.reserved]));
}

export function decodeDpiPreset(slot: Buffer, field = "dpiPreset"): DpiPreset {
    const data = decodeSetting(slot, field);

    return {
        x: dpiFromRaw(data[0]),
        y: dpiFromRaw(data[1]),
        reserved: data[2],
    };
}

export function encodeColor(color: Color, field = "color"): Buffer {
    assertRange(`${field}.red`, color.red, 0, 0xff);
    assertRange(`${field}.green`, color.green, 0, 0xff);
    assertRange(`${field}.blue`, color.blue, 0, 0xff);

    return encodeSetting(Buffer.from([color.red, color.green, color.blue]));
}

export function decodeColor(slot: Buffer, field = "color"): Color {
    const data = decodeSetting(slot, field);

    return { red: data[0], green: data[1], blue: data[2] };
}

/**
 * Button action: [code, param1, param2] + checksum.
 * Unused parameter bytes are written as zero.
 */
export function encodeButtonAction(action: ButtonAction, field = "buttonAction"): Buffer {
    const data = Buffer.alloc(3);

    switch (action.type) {
        case "fireKey": {
            assertRange(`${field}.interval`, action.interval, FieldConsts.FIRE_INTERVAL_MIN, FieldConsts.FIRE_INTERVAL_MAX);
            assertRange(`${field}.repeat`, action.repeat, 0, FieldConsts.FIRE_REPEAT_MAX);
            data[0] = ButtonActionCode.FIRE_KEY;
            data[1] = action.interval;
            data[2] = action.repeat;
            break;
        }
        case "macro": {
            assertRange(`${field}.index`, action.index, 0, FieldConsts.MACRO_INDEX_MAX);
            data[0] = ButtonActionCode.MACRO;
            data[1] = action.index;
            break;
        }
        case "dpiLock": {
            assertRange(`${field}.dpiStep`, action.dpiStep, FieldConsts.DPI_LOCK_STEP_MIN, FieldConsts.DPI_LOCK_STEP_MAX);
            data[0] = ButtonActionCode.DPI_LOCK;
            data[1] = action.dpiStep;
            break;
        }
        default: {
            const entry = SIMPLE_ACTIONS.find(([type]) => type === action.type);

            /* v8 ignore next 3 -- @preserve */
            if (entry === undefined) {
                throw new Error(`Unhandled button action ${action.type}`);
            }

            data[0] = entry[1];
            data[1] = entry[2];
            break;
        }
    }

    return encodeSetting(data);
}

export function decodeButtonAction(slot: Buffer, field = "buttonAction"): ButtonAction {
    const data = decodeSetting(slot, field);
    const code = data[0];

    switch (code) {
        case ButtonActionCode.FIRE_KEY: {
            assertRange(`${field}.interval`, data[1], FieldConsts.FIRE_INTERVAL_MIN, FieldConsts.FIRE_INTERVAL_MAX);
            assertRange(`${field}.repeat`, data[2], 0, FieldConsts.FIRE_REPEAT_MAX);

            return { type: "fireKey", interval: data[1], repeat: data[2] };
        }
        case ButtonActionCode.MACRO: {
            assertRange(`${field}.index`, data[1], 0, FieldConsts.MACRO_INDEX_MAX);

            return { type: "macro", index: data[1] };
        }
        case ButtonActionCode.DPI_LOCK: {
            assertRange(`${field}.dpiStep`, data[1], FieldConsts.DPI_LOCK_STEP_MIN, FieldConsts.DPI_LOCK_STEP_MAX);

            return { type: "dpiLock", dpiStep: data[1] };
        }
    }

    const subCoded = SUB_CODED_ACTIONS.has(code);
    const entry = SIMPLE_ACTIONS.find(([, entryCode, subCode]) => entryCode === code && (!subCoded || subCode === data[1]));

    if (entry === undefined) {
        throw new OutOfRangeError(subCoded ? `${field}[0x${code.toString(16).padStart(2, "0")}]` : `${field}.code`, subCoded ? data[1] : code);
    }

    return simpleAction(entry[0]);
}

/** Narrow a parameterless action type back to its variant */
function simpleAction(type: ButtonAction["type"]): ButtonAction {
    switch (type) {
        case "fireKey":
        case "macro":
        case "dpiLock":
            /* v8 ignore next -- @preserve */
            throw new Error(`Action ${type} carries parameters`);
        default:
            return { type };
    }
}
