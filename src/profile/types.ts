/** Polling rate in Hz (stored as a single-bit mask) */
export type ReportRate = 125 | 250 | 500 | 1000;

/** Lift-off distance in mm */
export type LiftOffDistance = 1 | 2;

export type DpiPreset = {
    /** DPI, multiple of 50 in 50-12800 */
    x: number;
    /** DPI, multiple of 50 in 50-12800 */
    y: number;
    /** unconfirmed semantics, carried through untouched */
    reserved: number;
};

export type Color = {
    red: number;
    green: number;
    blue: number;
};

export type ButtonAction =
    | { type: "disabled" }
    | { type: "leftClick" }
    | { type: "rightClick" }
    | { type: "middleClick" }
    | { type: "backClick" }
    | { type: "forwardClick" }
    | { type: "dpiLoop" }
    | { type: "dpiUp" }
    | { type: "dpiDown" }
    | { type: "scrollLeft" }
    | { type: "scrollRight" }
    | { type: "scrollUp" }
    | { type: "scrollDown" }
    /** interval in ms [10, 255], repeat [0, 3] */
    | { type: "fireKey"; interval: number; repeat: number }
    /** plays the key combo stored in the slot with the same index as the button */
    | { type: "keyCombo" }
    /** macro slot [0, 15] */
    | { type: "macro"; index: number }
    | { type: "pollRateLoop" }
    /** raw DPI step [1, 0x17] */
    | { type: "dpiLock"; dpiStep: number };

export type ButtonActionType = ButtonAction["type"];

export type KeyState = "press" | "release";

/** One interpretation of the shared 2-byte key data, picked by the event flag selector bits */
export type KeyData =
    /** HID modifier bitmask (LeftCtrl=0x01 ... RightMeta=0x80) */
    | { kind: "modifier"; mask: number }
    /** HID keyboard usage */
    | { kind: "hid"; code: number }
    /** HID consumer control usage */
    | { kind: "consumer"; code: number }
    /** pointer direction, single bit of 0x1f */
    | { kind: "direction"; mask: number };

export type KeyEvent = {
    state: KeyState;
    key: KeyData;
};

export type MacroEvent = KeyEvent & {
    /** uint16_t */
    delayMs: number;
};

export type KeyCombo = {
    /** up to 6 events (3 press/release pairs) */
    events: KeyEvent[];
};

export type Macro = {
    /** up to 30 UTF-8 bytes */
    name: string;
    /** up to 70 events */
    events: MacroEvent[];
};

/**
 * Byte ranges of the settings region whose semantics are unconfirmed.
 * Named after their offset, always their exact length, never interpreted.
 */
export type OpaqueRegions = {
    at0006: Buffer;
    at0050: Buffer;
    at00a0: Buffer;
    at00ad: Buffer;
    at00b3: Buffer;
    at00bb: Buffer;
};

/**
 * Undecoded 4-byte slot (data + checksum) of a DPI preset, DPI color or button action that is not in use.
 * Devices leave such slots zeroed or stale, they are written back exactly as read.
 */
export type RawSlot = Buffer;

export type Profile = {
    reportRate: ReportRate;
    /** active presets, 1-8 */
    dpiCount: number;
    /** 0-7 */
    dpiIndex: number;
    liftOffDistance: LiftOffDistance;
    /** always 8 slots, the first `dpiCount` are in use, the others are raw */
    dpiPresets: (DpiPreset | RawSlot)[];
    /** always 8 slots, paired with `dpiPresets` */
    dpiColors: (Color | RawSlot)[];
    chargingLedColor: Color;
    /** always 16 slots, the first 6 are in use, the others are raw */
    buttonActions: (ButtonAction | RawSlot)[];
    /** 0-15 ms */
    debounceMs: number;
    motionSync: boolean;
    angleSnapping: boolean;
    rippleControl: boolean;
    peakPerformance: boolean;
    /** seconds, multiple of 10 up to 2550 */
    peakPerformanceTime: number;
    performanceMode: boolean;
    /** always 16 slots, `null` for erased slots */
    keyCombos: (KeyCombo | null)[];
    /** always 16 slots, `null` for erased slots */
    macros: (Macro | null)[];
    opaque: OpaqueRegions;
};

/**
 * Sparse slot patch: `undefined` entries (or holes) leave the slot untouched.
 */
export type SlotPatch<T> = ReadonlyArray<T | undefined>;

type SlotKeys = "dpiPresets" | "dpiColors" | "buttonActions" | "keyCombos" | "macros";

/**
 * Every field optional, used for read-merge-write.
 * Fields absent from the patch keep the device's current bytes.
 */
export type PartialProfile = Partial<Omit<Profile, SlotKeys | "opaque">> & {
    dpiPresets?: SlotPatch<DpiPreset | RawSlot>;
    dpiColors?: SlotPatch<Color | RawSlot>;
    buttonActions?: SlotPatch<ButtonAction | RawSlot>;
    keyCombos?: SlotPatch<KeyCombo | null>;
    macros?: SlotPatch<Macro | null>;
    opaque?: Partial<OpaqueRegions>;
};
