export { ChecksumSeed, checksum, verifyChecksum } from "./protocol/checksum.js";
export {
    ChecksumMismatchError,
    CountOutOfRangeError,
    DeviceError,
    InvalidFlagsError,
    InvalidValueError,
    LayoutError,
    OutOfRangeError,
    ProfileError,
    ProtocolError,
    TransportError,
} from "./protocol/errors.js";
export { assertFrameOk, decodeFrame, encodeFrame, type Frame, FrameConsts, frameChecksumSeed, ProfileCommand } from "./protocol/frame.js";
export { ProfileConsts } from "./profile/consts.js";
export {
    decodeButtonAction,
    decodeColor,
    decodeDpiPreset,
    decodeReportRate,
    dpiFromRaw,
    dpiToRaw,
    encodeButtonAction,
    encodeColor,
    encodeDpiPreset,
    encodeReportRate,
} from "./profile/fields.js";
export { decodeKeyCombo, decodeKeyEvent, decodeMacro, decodeMacroEvent, encodeKeyCombo, encodeKeyEvent, encodeMacro, encodeMacroEvent } from "./profile/macro.js";
export { partialProfileFromJson, profileFromJson, profilesFromJson, reviveBuffers } from "./profile/json.js";
export { type LayoutEntry, locateField, mergeProfile, PROFILE_FIELDS, PROFILE_LAYOUT, profileFromBytes, profileToBytes } from "./profile/layout.js";
export type {
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
    SlotPatch,
} from "./profile/types.js";
export { ProfileSession, type SessionOptions } from "./transfer/profile-session.js";
export {
    DEFAULT_TRANSFER_OPTIONS,
    type PartialWriteMode,
    type ProfileTransport,
    TransferConsts,
    TransferPlanner,
    type TransferOptions,
    type TransferState,
} from "./transfer/transfer-planner.js";
export { type Logger, logger, setLogger } from "./utils/logger.js";
