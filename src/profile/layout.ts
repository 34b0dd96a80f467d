import assert from "node:assert";
import { CountOutOfRangeError, InvalidValueError, LayoutError, OutOfRangeError, ProtocolError } from "../protocol/errors.js";
import { ProfileConsts } from "./consts.js";
import {
    decodeBoolSetting,
    decodeButtonAction,
    decodeColor,
    decodeDpiPreset,
    decodeLiftOffDistance,
    decodePeakPerformanceTime,
    decodeReportRate,
    decodeU8Setting,
    encodeBoolSetting,
    encodeButtonAction,
    encodeColor,
    encodeDpiPreset,
    encodeLiftOffDistance,
    encodePeakPerformanceTime,
    encodeReportRate,
    encodeU8Setting,
    FieldConsts,
} from "./fields.js";
import { decodeKeyCombo, decodeMacro, encodeKeyCombo, encodeMacro } from "./macro.js";
import type { OpaqueRegions, PartialProfile, Profile, RawSlot, SlotPatch } from "./types.js";

export type LayoutEntry = {
    /** e.g. `reportRate`, `buttonActions[3]`, `opaque.at00a0` */
    readonly field: string;
    readonly offset: number;
    /** including the checksum byte(s) */
    readonly length: number;
};

function at(field: string, offset: number, length: number): LayoutEntry {
    return Object.freeze({ field, offset, length });
}

function slots(field: string, offset: number, length: number, count: number): readonly LayoutEntry[] {
    return Object.freeze(Array.from({ length: count }, (_, i) => at(`${field}[${i}]`, offset + i * length, length)));
}

/**
 * Where every field lives in the 0x1b00-byte active profile.
 */
export const PROFILE_LAYOUT = Object.freeze({
    reportRate: at("reportRate", 0x00, FieldConsts.U8_SETTING_SIZE),
    dpiCount: at("dpiCount", 0x02, FieldConsts.U8_SETTING_SIZE),
    dpiIndex: at("dpiIndex", 0x04, FieldConsts.U8_SETTING_SIZE),
    liftOffDistance: at("liftOffDistance", 0x0a, FieldConsts.U8_SETTING_SIZE),
    dpiPresets: slots("dpiPresets", 0x0c, FieldConsts.GROUP_SETTING_SIZE, ProfileConsts.DPI_SLOTS),
    dpiColors: slots("dpiColors", 0x2c, FieldConsts.GROUP_SETTING_SIZE, ProfileConsts.DPI_SLOTS),
    chargingLedColor: at("chargingLedColor", 0x4c, FieldConsts.GROUP_SETTING_SIZE),
    buttonActions: slots("buttonActions", 0x60, FieldConsts.GROUP_SETTING_SIZE, ProfileConsts.BUTTON_SLOTS),
    debounceMs: at("debounceMs", 0xa9, FieldConsts.U8_SETTING_SIZE),
    motionSync: at("motionSync", 0xab, FieldConsts.U8_SETTING_SIZE),
    angleSnapping: at("angleSnapping", 0xaf, FieldConsts.U8_SETTING_SIZE),
    rippleControl: at("rippleControl", 0xb1, FieldConsts.U8_SETTING_SIZE),
    peakPerformance: at("peakPerformance", 0xb5, FieldConsts.U8_SETTING_SIZE),
    peakPerformanceTime: at("peakPerformanceTime", 0xb7, FieldConsts.U8_SETTING_SIZE),
    performanceMode: at("performanceMode", 0xb9, FieldConsts.U8_SETTING_SIZE),
    keyCombos: slots("keyCombos", ProfileConsts.KEY_COMBO_START, ProfileConsts.KEY_COMBO_SLOT_SIZE, ProfileConsts.KEY_COMBO_SLOTS),
    macros: slots("macros", ProfileConsts.MACRO_START, ProfileConsts.MACRO_SLOT_SIZE, ProfileConsts.MACRO_SLOTS),
    opaque: Object.freeze({
        at0006: at("opaque.at0006", 0x06, 4),
        at0050: at("opaque.at0050", 0x50, 16),
        at00a0: at("opaque.at00a0", 0xa0, 9),
        at00ad: at("opaque.at00ad", 0xad, 2),
        at00b3: at("opaque.at00b3", 0xb3, 2),
        at00bb: at("opaque.at00bb", 0xbb, ProfileConsts.SETTINGS_END - 0xbb),
    } satisfies Record<keyof OpaqueRegions, LayoutEntry>),
});

const { dpiPresets, dpiColors, buttonActions, keyCombos, macros, opaque, ...scalars } = PROFILE_LAYOUT;

/** All entries in offset order, covering the whole profile without gaps */
export const PROFILE_FIELDS: readonly LayoutEntry[] = Object.freeze(
    [...Object.values(scalars), ...Object.values(opaque), ...dpiPresets, ...dpiColors, ...buttonActions, ...keyCombos, ...macros].sort(
        (a, b) => a.offset - b.offset,
    ),
);

export const OPAQUE_KEYS: readonly (keyof OpaqueRegions)[] = ["at0006", "at0050", "at00a0", "at00ad", "at00b3", "at00bb"];

/**
 * @returns the entry owning the byte at `address`, undefined when out of bounds
 */
export function locateField(address: number): LayoutEntry | undefined {
    return PROFILE_FIELDS.find((entry) => address >= entry.offset && address < entry.offset + entry.length);
}

/**
 * Decode a full profile. Fails on the first invalid field (in offset order), nothing is defaulted.
 * DPI slots past `dpiCount` and button slots past `ProfileConsts.BUTTON_COUNT` are kept raw.
 */
export function profileFromBytes(blob: Buffer): Profile {
    if (blob.byteLength !== ProfileConsts.SIZE) {
        throw new ProtocolError(`Invalid profile size ${blob.byteLength}, expected ${ProfileConsts.SIZE}`);
    }

    const read = <T>(entry: LayoutEntry, decode: (slot: Buffer, field: string) => T): T => {
        try {
            return decode(blob.subarray(entry.offset, entry.offset + entry.length), entry.field);
        } catch (error) {
            throw new LayoutError(entry.field, entry.offset, error);
        }
    };
    const readSlots = <T>(entries: readonly LayoutEntry[], decode: (slot: Buffer, field: string) => T): T[] =>
        entries.map((entry) => read(entry, decode));
    // copy, callers may reuse the blob
    const readOpaque = (slot: Buffer): Buffer => Buffer.from(slot);
    const readInUse = <T>(entries: readonly LayoutEntry[], inUse: number, decode: (slot: Buffer, field: string) => T): (T | RawSlot)[] =>
        entries.map((entry, i) => (i < inUse ? read(entry, decode) : read(entry, readOpaque)));
    const layout = PROFILE_LAYOUT;

    const reportRate = read(layout.reportRate, decodeReportRate);
    const dpiCount = read(layout.dpiCount, (slot, field) => decodeU8Setting(slot, field, 1, ProfileConsts.DPI_SLOTS));
    const dpiIndex = read(layout.dpiIndex, (slot, field) => decodeU8Setting(slot, field, 0, ProfileConsts.DPI_SLOTS - 1));
    const at0006 = read(layout.opaque.at0006, readOpaque);
    const liftOffDistance = read(layout.liftOffDistance, decodeLiftOffDistance);
    const dpiPresets = readInUse(layout.dpiPresets, dpiCount, decodeDpiPreset);
    const dpiColors = readInUse(layout.dpiColors, dpiCount, decodeColor);
    const chargingLedColor = read(layout.chargingLedColor, decodeColor);
    const at0050 = read(layout.opaque.at0050, readOpaque);
    const buttonActions = readInUse(layout.buttonActions, ProfileConsts.BUTTON_COUNT, decodeButtonAction);
    const at00a0 = read(layout.opaque.at00a0, readOpaque);
    const debounceMs = read(layout.debounceMs, (slot, field) => decodeU8Setting(slot, field, 0, FieldConsts.DEBOUNCE_MAX_MS));
    const motionSync = read(layout.motionSync, decodeBoolSetting);
    const at00ad = read(layout.opaque.at00ad, readOpaque);
    const angleSnapping = read(layout.angleSnapping, decodeBoolSetting);
    const rippleControl = read(layout.rippleControl, decodeBoolSetting);
    const at00b3 = read(layout.opaque.at00b3, readOpaque);
    const peakPerformance = read(layout.peakPerformance, decodeBoolSetting);
    const peakPerformanceTime = read(layout.peakPerformanceTime, decodePeakPerformanceTime);
    const performanceMode = read(layout.performanceMode, decodeBoolSetting);
    const at00bb = read(layout.opaque.at00bb, readOpaque);
    const keyCombos = readSlots(layout.keyCombos, decodeKeyCombo);
    const macros = readSlots(layout.macros, decodeMacro);

    return {
        reportRate,
        dpiCount,
        dpiIndex,
        liftOffDistance,
        dpiPresets,
        dpiColors,
        chargingLedColor,
        buttonActions,
        debounceMs,
        motionSync,
        angleSnapping,
        rippleControl,
        peakPerformance,
        peakPerformanceTime,
        performanceMode,
        keyCombos,
        macros,
        opaque: { at0006, at0050, at00a0, at00ad, at00b3, at00bb },
    };
}

function assertSlotCount(field: string, values: readonly unknown[], expected: number): void {
    if (values.length !== expected) {
        throw new OutOfRangeError(`${field}.length`, values.length);
    }
}

/**
 * Encode a full profile; every byte of the output is owned by exactly one field.
 * Slots in use must hold decoded values, unused ones take either a value or a `RawSlot`.
 */
export function profileToBytes(profile: Profile): Buffer {
    const blob = Buffer.alloc(ProfileConsts.SIZE);
    const layout = PROFILE_LAYOUT;
    let written = 0;

    const write = (entry: LayoutEntry, bytes: Buffer): void => {
        assert(bytes.byteLength === entry.length, `${entry.field} encoded to ${bytes.byteLength} bytes, expected ${entry.length}`);
        blob.set(bytes, entry.offset);

        written += bytes.byteLength;
    };
    const writeSlots = <T>(entries: readonly LayoutEntry[], field: string, values: readonly T[], encode: (value: T, field: string) => Buffer): void => {
        assertSlotCount(field, values, entries.length);

        for (let i = 0; i < entries.length; i++) {
            write(entries[i], encode(values[i], entries[i].field));
        }
    };
    const writeOpaque = (entry: LayoutEntry, bytes: Buffer): void => {
        if (bytes.byteLength !== entry.length) {
            throw new OutOfRangeError(`${entry.field}.length`, bytes.byteLength);
        }

        write(entry, bytes);
    };
    const writeInUse = <T>(
        entries: readonly LayoutEntry[],
        field: string,
        values: readonly (T | RawSlot)[],
        inUse: number,
        encode: (value: T, field: string) => Buffer,
    ): void => {
        assertSlotCount(field, values, entries.length);

        for (let i = 0; i < entries.length; i++) {
            const value = values[i];

            if (!Buffer.isBuffer(value)) {
                write(entries[i], encode(value, entries[i].field));
            } else if (i < inUse) {
                throw new InvalidValueError(entries[i].field, "a decoded value for a slot in use");
            } else {
                writeOpaque(entries[i], value);
            }
        }
    };

    write(layout.reportRate, encodeReportRate(profile.reportRate));
    write(layout.dpiCount, encodeU8Setting(profile.dpiCount, layout.dpiCount.field, 1, ProfileConsts.DPI_SLOTS));
    write(layout.dpiIndex, encodeU8Setting(profile.dpiIndex, layout.dpiIndex.field, 0, ProfileConsts.DPI_SLOTS - 1));
    writeOpaque(layout.opaque.at0006, profile.opaque.at0006);
    write(layout.liftOffDistance, encodeLiftOffDistance(profile.liftOffDistance));
    writeInUse(layout.dpiPresets, "dpiPresets", profile.dpiPresets, profile.dpiCount, encodeDpiPreset);
    writeInUse(layout.dpiColors, "dpiColors", profile.dpiColors, profile.dpiCount, encodeColor);
    write(layout.chargingLedColor, encodeColor(profile.chargingLedColor, layout.chargingLedColor.field));
    writeOpaque(layout.opaque.at0050, profile.opaque.at0050);
    writeInUse(layout.buttonActions, "buttonActions", profile.buttonActions, ProfileConsts.BUTTON_COUNT, encodeButtonAction);
    writeOpaque(layout.opaque.at00a0, profile.opaque.at00a0);
    write(layout.debounceMs, encodeU8Setting(profile.debounceMs, layout.debounceMs.field, 0, FieldConsts.DEBOUNCE_MAX_MS));
    write(layout.motionSync, encodeBoolSetting(profile.motionSync, layout.motionSync.field));
    writeOpaque(layout.opaque.at00ad, profile.opaque.at00ad);
    write(layout.angleSnapping, encodeBoolSetting(profile.angleSnapping, layout.angleSnapping.field));
    write(layout.rippleControl, encodeBoolSetting(profile.rippleControl, layout.rippleControl.field));
    writeOpaque(layout.opaque.at00b3, profile.opaque.at00b3);
    write(layout.peakPerformance, encodeBoolSetting(profile.peakPerformance, layout.peakPerformance.field));
    write(layout.peakPerformanceTime, encodePeakPerformanceTime(profile.peakPerformanceTime));
    write(layout.performanceMode, encodeBoolSetting(profile.performanceMode, layout.performanceMode.field));
    writeOpaque(layout.opaque.at00bb, profile.opaque.at00bb);
    writeSlots(layout.keyCombos, "keyCombos", profile.keyCombos, encodeKeyCombo);
    writeSlots(layout.macros, "macros", profile.macros, encodeMacro);

    assert(written === ProfileConsts.SIZE, `Profile encoded to ${written} bytes, expected ${ProfileConsts.SIZE}`);

    return blob;
}

function mergeSlots<T>(field: string, base: readonly T[], patch: SlotPatch<T> | undefined): T[] {
    const merged = [...base];

    if (patch === undefined) {
        return merged;
    }

    if (patch.length > base.length) {
        throw new CountOutOfRangeError(field, patch.length, base.length);
    }

    for (let i = 0; i < patch.length; i++) {
        const value = patch[i];

        // `null` is a value (erased slot), only `undefined`/holes are skipped
        if (value !== undefined) {
            merged[i] = value;
        }
    }

    return merged;
}

/**
 * Overlay the fields present in `patch` onto `base`. `base` is not modified.
 * Fields absent from `patch` (including opaque regions) are carried over as-is.
 */
export function mergeProfile(base: Profile, patch: PartialProfile): Profile {
    return {
        reportRate: patch.reportRate ?? base.reportRate,
        dpiCount: patch.dpiCount ?? base.dpiCount,
        dpiIndex: patch.dpiIndex ?? base.dpiIndex,
        liftOffDistance: patch.liftOffDistance ?? base.liftOffDistance,
        dpiPresets: mergeSlots("dpiPresets", base.dpiPresets, patch.dpiPresets),
        dpiColors: mergeSlots("dpiColors", base.dpiColors, patch.dpiColors),
        chargingLedColor: patch.chargingLedColor ?? base.chargingLedColor,
        buttonActions: mergeSlots("buttonActions", base.buttonActions, patch.buttonActions),
        debounceMs: patch.debounceMs ?? base.debounceMs,
        motionSync: patch.motionSync ?? base.motionSync,
        angleSnapping: patch.angleSnapping ?? base.angleSnapping,
        rippleControl: patch.rippleControl ?? base.rippleControl,
        peakPerformance: patch.peakPerformance ?? base.peakPerformance,
        peakPerformanceTime: patch.peakPerformanceTime ?? base.peakPerformanceTime,
        performanceMode: patch.performanceMode ?? base.performanceMode,
        keyCombos: mergeSlots("keyCombos", base.keyCombos, patch.keyCombos),
        macros: mergeSlots("macros", base.macros, patch.macros),
        opaque: { ...base.opaque, ...definedEntries(patch.opaque) },
    };
}

function definedEntries(regions: Partial<OpaqueRegions> | undefined): Partial<OpaqueRegions> {
    const result: Partial<OpaqueRegions> = {};

    if (regions === undefined) {
        return result;
    }

    for (const key of OPAQUE_KEYS) {
        const value = regions[key];

        if (value !== undefined) {
            result[key] = value;
        }
    }

    return result;
}
