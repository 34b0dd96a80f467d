/**
 * const enum with sole purpose of avoiding "magic numbers" for the profile memory map
 */
export const enum ProfileConsts {
    /** Total addressable bytes of the active profile */
    SIZE = 0x1b00,
    /** Scalar/group settings occupy 0x0000-0x00ff */
    SETTINGS_END = 0x0100,

    KEY_COMBO_START = 0x0100,
    KEY_COMBO_SLOT_SIZE = 32,
    KEY_COMBO_SLOTS = 16,
    KEY_COMBO_MAX_EVENTS = 6,

    MACRO_START = 0x0300,
    MACRO_SLOT_SIZE = 384,
    MACRO_SLOTS = 16,
    MACRO_MAX_NAME_LENGTH = 30,
    MACRO_MAX_EVENTS = 70,

    DPI_SLOTS = 8,
    BUTTON_SLOTS = 16,
    /** Buttons wired on the supported mice, slots past these are never interpreted */
    BUTTON_COUNT = 6,

    /** Device-resident profiles, only the active one is addressable */
    STORED_PROFILES = 4,
}

/** True when `address` lies in the key combo or macro regions (blocks carrying their own checksum, seed 181) */
export function isMacroRegion(address: number): boolean {
    return address >= ProfileConsts.KEY_COMBO_START && address < ProfileConsts.SIZE;
}
