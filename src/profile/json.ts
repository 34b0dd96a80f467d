import { InvalidValueError } from "../protocol/errors.js";
import { isReportRate } from "./fields.js";
import { OPAQUE_KEYS } from "./layout.js";
import type {
    ButtonAction,
    ButtonActionType,
    Color,
    DpiPreset,
    KeyCombo,
    KeyData,
    KeyEvent,
    KeyState,
    LiftOffDistance,
    Macro,
    MacroEvent,
    OpaqueRegions,
    PartialProfile,
    Profile,
    RawSlot,
    ReportRate,
} from "./types.js";

/**
 * Structural checks of profiles read from JSON (CLI input, saved files).
 * Only shapes are checked here, value ranges are enforced by the codecs when encoding.
 * Byte arrays are expected as revived Buffers (@see reviveBuffers).
 */

type JsonObject = Record<string, unknown>;
type Parser<T> = (value: unknown, path: string) => T;

const PROFILE_KEYS: readonly (keyof Profile)[] = [
    "reportRate",
    "dpiCount",
    "dpiIndex",
    "liftOffDistance",
    "dpiPresets",
    "dpiColors",
    "chargingLedColor",
    "buttonActions",
    "debounceMs",
    "motionSync",
    "angleSnapping",
    "rippleControl",
    "peakPerformance",
    "peakPerformanceTime",
    "performanceMode",
    "keyCombos",
    "macros",
    "opaque",
];

const BUTTON_ACTION_TYPES: readonly ButtonActionType[] = [
    "disabled",
    "leftClick",
    "rightClick",
    "middleClick",
    "backClick",
    "forwardClick",
    "dpiLoop",
    "dpiUp",
    "dpiDown",
    "scrollLeft",
    "scrollRight",
    "scrollUp",
    "scrollDown",
    "fireKey",
    "keyCombo",
    "macro",
    "pollRateLoop",
    "dpiLock",
];

/**
 * `JSON.parse` reviver turning `{ type: "Buffer", data: [...] }` (the JSON form of a Buffer) back into a Buffer.
 */
export function reviveBuffers(_key: string, value: unknown): unknown {
    if (
        typeof value === "object" &&
        value !== null &&
        "type" in value &&
        value.type === "Buffer" &&
        "data" in value &&
        Array.isArray(value.data) &&
        value.data.every((byte: unknown) => typeof byte === "number" && Number.isInteger(byte) && byte >= 0 && byte <= 0xff)
    ) {
        return Buffer.from(value.data);
    }

    return value;
}

// #region Primitives

function isObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value) && !Buffer.isBuffer(value);
}

function object(value: unknown, path: string, keys: readonly string[]): JsonObject {
    if (!isObject(value)) {
        throw new InvalidValueError(path, "an object");
    }

    for (const key of Object.keys(value)) {
        if (!keys.includes(key)) {
            throw new InvalidValueError(`${path}.${key}`, `one of ${keys.join(", ")}`);
        }
    }

    return value;
}

function integer(value: unknown, path: string): number {
    if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new InvalidValueError(path, "an integer");
    }

    return value;
}

function boolean(value: unknown, path: string): boolean {
    if (typeof value !== "boolean") {
        throw new InvalidValueError(path, "a boolean");
    }

    return value;
}

function bytes(value: unknown, path: string): Buffer {
    if (!Buffer.isBuffer(value)) {
        throw new InvalidValueError(path, "bytes");
    }

    return value;
}

function slots<T>(value: unknown, path: string, parse: Parser<T>): T[] {
    if (!Array.isArray(value)) {
        throw new InvalidValueError(path, "an array");
    }

    return value.map((item: unknown, i: number) => parse(item, `${path}[${i}]`));
}

/** `null` entries leave the slot untouched */
function slotPatch<T>(value: unknown, path: string, parse: Parser<T>): (T | undefined)[] {
    return slots(value, path, (item, itemPath) => (item === null ? undefined : parse(item, itemPath)));
}

// #endregion

// #region Fields

function reportRate(value: unknown, path: string): ReportRate {
    const rate = integer(value, path);

    if (!isReportRate(rate)) {
        throw new InvalidValueError(path, "one of 125, 250, 500, 1000");
    }

    return rate;
}

function liftOffDistance(value: unknown, path: string): LiftOffDistance {
    const distance = integer(value, path);

    if (distance !== 1 && distance !== 2) {
        throw new InvalidValueError(path, "1 or 2");
    }

    return distance;
}

function dpiPreset(value: unknown, path: string): DpiPreset | RawSlot {
    if (Buffer.isBuffer(value)) {
        return value;
    }

    const json = object(value, path, ["x", "y", "reserved"]);

    return { x: integer(json.x, `${path}.x`), y: integer(json.y, `${path}.y`), reserved: integer(json.reserved, `${path}.reserved`) };
}

function color(value: unknown, path: string): Color {
    const json = object(value, path, ["red", "green", "blue"]);

    return { red: integer(json.red, `${path}.red`), green: integer(json.green, `${path}.green`), blue: integer(json.blue, `${path}.blue`) };
}

function dpiColor(value: unknown, path: string): Color | RawSlot {
    return Buffer.isBuffer(value) ? value : color(value, path);
}

function isButtonActionType(value: unknown): value is ButtonActionType {
    return BUTTON_ACTION_TYPES.some((type) => type === value);
}

function buttonAction(value: unknown, path: string): ButtonAction | RawSlot {
    if (Buffer.isBuffer(value)) {
        return value;
    }

    const json = object(value, path, ["type", "interval", "repeat", "index", "dpiStep"]);
    const type = json.type;

    if (!isButtonActionType(type)) {
        throw new InvalidValueError(`${path}.type`, `one of ${BUTTON_ACTION_TYPES.join(", ")}`);
    }

    switch (type) {
        case "fireKey":
            return { type, interval: integer(json.interval, `${path}.interval`), repeat: integer(json.repeat, `${path}.repeat`) };
        case "macro":
            return { type, index: integer(json.index, `${path}.index`) };
        case "dpiLock":
            return { type, dpiStep: integer(json.dpiStep, `${path}.dpiStep`) };
        default:
            return { type };
    }
}

function keyState(value: unknown, path: string): KeyState {
    if (value !== "press" && value !== "release") {
        throw new InvalidValueError(path, "press or release");
    }

    return value;
}

function keyData(value: unknown, path: string): KeyData {
    const json = object(value, path, ["kind", "mask", "code"]);
    const kind = json.kind;

    if (kind === "modifier" || kind === "direction") {
        return { kind, mask: integer(json.mask, `${path}.mask`) };
    }

    if (kind === "hid" || kind === "consumer") {
        return { kind, code: integer(json.code, `${path}.code`) };
    }

    throw new InvalidValueError(`${path}.kind`, "one of modifier, hid, consumer, direction");
}

function keyEvent(value: unknown, path: string): KeyEvent {
    const json = object(value, path, ["state", "key"]);

    return { state: keyState(json.state, `${path}.state`), key: keyData(json.key, `${path}.key`) };
}

function macroEvent(value: unknown, path: string): MacroEvent {
    const json = object(value, path, ["state", "key", "delayMs"]);

    return { state: keyState(json.state, `${path}.state`), key: keyData(json.key, `${path}.key`), delayMs: integer(json.delayMs, `${path}.delayMs`) };
}

function keyCombo(value: unknown, path: string): KeyCombo | null {
    if (value === null) {
        return null;
    }

    const json = object(value, path, ["events"]);

    return { events: slots(json.events, `${path}.events`, keyEvent) };
}

function macro(value: unknown, path: string): Macro | null {
    if (value === null) {
        return null;
    }

    const json = object(value, path, ["name", "events"]);

    if (typeof json.name !== "string") {
        throw new InvalidValueError(`${path}.name`, "a string");
    }

    return { name: json.name, events: slots(json.events, `${path}.events`, macroEvent) };
}

function opaque(value: unknown, path: string): OpaqueRegions {
    const json = object(value, path, OPAQUE_KEYS);
    const region = (key: keyof OpaqueRegions): Buffer => bytes(json[key], `${path}.${key}`);

    return {
        at0006: region("at0006"),
        at0050: region("at0050"),
        at00a0: region("at00a0"),
        at00ad: region("at00ad"),
        at00b3: region("at00b3"),
        at00bb: region("at00bb"),
    };
}

function partialOpaque(value: unknown, path: string): Partial<OpaqueRegions> {
    const json = object(value, path, OPAQUE_KEYS);
    const patch: Partial<OpaqueRegions> = {};

    for (const key of OPAQUE_KEYS) {
        if (json[key] !== undefined) {
            patch[key] = bytes(json[key], `${path}.${key}`);
        }
    }

    return patch;
}

// #endregion

/**
 * Every field required; `dpiPresets`, `dpiColors` and `buttonActions` entries are values or raw slot bytes.
 */
export function profileFromJson(value: unknown, path = "profile"): Profile {
    const json = object(value, path, PROFILE_KEYS);
    const at = (key: keyof Profile): string => `${path}.${key}`;
    const field = (key: keyof Profile): unknown => {
        if (json[key] === undefined) {
            throw new InvalidValueError(at(key), "a value");
        }

        return json[key];
    };

    return {
        reportRate: reportRate(field("reportRate"), at("reportRate")),
        dpiCount: integer(field("dpiCount"), at("dpiCount")),
        dpiIndex: integer(field("dpiIndex"), at("dpiIndex")),
        liftOffDistance: liftOffDistance(field("liftOffDistance"), at("liftOffDistance")),
        dpiPresets: slots(field("dpiPresets"), at("dpiPresets"), dpiPreset),
        dpiColors: slots(field("dpiColors"), at("dpiColors"), dpiColor),
        chargingLedColor: color(field("chargingLedColor"), at("chargingLedColor")),
        buttonActions: slots(field("buttonActions"), at("buttonActions"), buttonAction),
        debounceMs: integer(field("debounceMs"), at("debounceMs")),
        motionSync: boolean(field("motionSync"), at("motionSync")),
        angleSnapping: boolean(field("angleSnapping"), at("angleSnapping")),
        rippleControl: boolean(field("rippleControl"), at("rippleControl")),
        peakPerformance: boolean(field("peakPerformance"), at("peakPerformance")),
        peakPerformanceTime: integer(field("peakPerformanceTime"), at("peakPerformanceTime")),
        performanceMode: boolean(field("performanceMode"), at("performanceMode")),
        keyCombos: slots(field("keyCombos"), at("keyCombos"), keyCombo),
        macros: slots(field("macros"), at("macros"), macro),
        opaque: opaque(field("opaque"), at("opaque")),
    };
}

/**
 * @returns one profile per stored profile slot, in index order
 */
export function profilesFromJson(value: unknown, path = "profiles"): Profile[] {
    return slots(value, path, profileFromJson);
}

/**
 * Every field optional. In `dpiPresets`, `dpiColors` and `buttonActions`, `null` leaves the slot untouched;
 * in `keyCombos` and `macros` it erases the slot.
 */
export function partialProfileFromJson(value: unknown, path = "profile"): PartialProfile {
    const json = object(value, path, PROFILE_KEYS);
    const at = (key: keyof Profile): string => `${path}.${key}`;
    const patch: PartialProfile = {};

    if (json.reportRate !== undefined) {
        patch.reportRate = reportRate(json.reportRate, at("reportRate"));
    }

    if (json.dpiCount !== undefined) {
        patch.dpiCount = integer(json.dpiCount, at("dpiCount"));
    }

    if (json.dpiIndex !== undefined) {
        patch.dpiIndex = integer(json.dpiIndex, at("dpiIndex"));
    }

    if (json.liftOffDistance !== undefined) {
        patch.liftOffDistance = liftOffDistance(json.liftOffDistance, at("liftOffDistance"));
    }

    if (json.dpiPresets !== undefined) {
        patch.dpiPresets = slotPatch(json.dpiPresets, at("dpiPresets"), dpiPreset);
    }

    if (json.dpiColors !== undefined) {
        patch.dpiColors = slotPatch(json.dpiColors, at("dpiColors"), dpiColor);
    }

    if (json.chargingLedColor !== undefined) {
        patch.chargingLedColor = color(json.chargingLedColor, at("chargingLedColor"));
    }

    if (json.buttonActions !== undefined) {
        patch.buttonActions = slotPatch(json.buttonActions, at("buttonActions"), buttonAction);
    }

    if (json.debounceMs !== undefined) {
        patch.debounceMs = integer(json.debounceMs, at("debounceMs"));
    }

    for (const key of ["motionSync", "angleSnapping", "rippleControl", "peakPerformance", "performanceMode"] as const) {
        if (json[key] !== undefined) {
            patch[key] = boolean(json[key], at(key));
        }
    }

    if (json.peakPerformanceTime !== undefined) {
        patch.peakPerformanceTime = integer(json.peakPerformanceTime, at("peakPerformanceTime"));
    }

    if (json.keyCombos !== undefined) {
        patch.keyCombos = slots(json.keyCombos, at("keyCombos"), keyCombo);
    }

    if (json.macros !== undefined) {
        patch.macros = slots(json.macros, at("macros"), macro);
    }

    if (json.opaque !== undefined) {
        patch.opaque = partialOpaque(json.opaque, at("opaque"));
    }

    return patch;
}
