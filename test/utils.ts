import { ProfileConsts } from "../src/profile/consts.js";
import { profileToBytes } from "../src/profile/layout.js";
import type { ButtonAction, KeyCombo, Macro, Profile, RawSlot } from "../src/profile/types.js";
import { decodeFrame, encodeFrame, type Frame, FrameConsts, ProfileCommand } from "../src/protocol/frame.js";
import type { ProfileTransport } from "../src/transfer/transfer-planner.js";

/** Zeroed, as the device leaves slots it does not use */
export function unusedSlots(count: number): RawSlot[] {
    return Array.from({ length: count }, () => Buffer.alloc(4));
}

/** Helper to create a valid profile, every call returns fresh objects */
export function createProfile(dpiIndex = 1): Profile {
    const buttons: ButtonAction[] = [
        { type: "leftClick" },
        { type: "rightClick" },
        { type: "middleClick" },
        { type: "backClick" },
        { type: "forwardClick" },
        { type: "dpiLoop" },
    ];

    const copyCombo: KeyCombo = {
        events: [
            { state: "press", key: { kind: "modifier", mask: 0x01 } },
            { state: "press", key: { kind: "hid", code: 0x06 } },
            { state: "release", key: { kind: "hid", code: 0x06 } },
            { state: "release", key: { kind: "modifier", mask: 0x01 } },
        ],
    };
    const copyMacro: Macro = {
        name: "copy",
        events: [
            { state: "press", key: { kind: "hid", code: 0x06 }, delayMs: 10 },
            { state: "release", key: { kind: "hid", code: 0x06 }, delayMs: 20 },
        ],
    };

    return {
        reportRate: 1000,
        dpiCount: 4,
        dpiIndex,
        liftOffDistance: 1,
        dpiPresets: [...[400, 800, 1600, 3200].map((dpi) => ({ x: dpi, y: dpi, reserved: 0 })), ...unusedSlots(4)],
        dpiColors: [...Array.from({ length: 4 }, (_, i) => ({ red: i * 10, green: 0x80, blue: 0xff })), ...unusedSlots(4)],
        chargingLedColor: { red: 0, green: 0xff, blue: 0 },
        buttonActions: [...buttons, ...unusedSlots(ProfileConsts.BUTTON_SLOTS - ProfileConsts.BUTTON_COUNT)],
        debounceMs: 4,
        motionSync: true,
        angleSnapping: false,
        rippleControl: false,
        peakPerformance: true,
        peakPerformanceTime: 60,
        performanceMode: false,
        keyCombos: [copyCombo, ...Array.from({ length: ProfileConsts.KEY_COMBO_SLOTS - 1 }, () => null)],
        macros: [copyMacro, ...Array.from({ length: ProfileConsts.MACRO_SLOTS - 1 }, () => null)],
        opaque: {
            at0006: Buffer.alloc(4, 0x11),
            at0050: Buffer.alloc(16, 0x22),
            at00a0: Buffer.alloc(9, 0x33),
            at00ad: Buffer.alloc(2, 0x44),
            at00b3: Buffer.alloc(2, 0x55),
            at00bb: Buffer.alloc(69, 0x66),
        },
    };
}

/**
 * Consulted before the regular response: a returned Buffer is sent back as is, a returned Error is thrown,
 * `undefined` lets the device answer normally.
 */
export type FakeFault = (request: Frame, device: FakeDevice) => Buffer | Error | undefined;

/** Frame with a non-zero error code answering `request` */
export function errorResponse(request: Frame, code: number): Buffer {
    return encodeFrame(request.command, code, request.address, Buffer.alloc(0));
}

/**
 * In-process stand-in for the mouse: 4 stored profiles, only the active one addressable.
 */
export class FakeDevice implements ProfileTransport {
    public readonly profiles: Buffer[];
    public active: number;
    public readonly requests: Frame[] = [];
    public fault: FakeFault | undefined;
    /** caps the payload length of profile data reads */
    public readLength: number = FrameConsts.MAX_PAYLOAD;
    public maxInFlight = 0;
    #inFlight = 0;

    constructor(profiles: Buffer[] = [0, 1, 2, 3].map((i) => profileToBytes(createProfile(i))), active = 0) {
        this.profiles = profiles;
        this.active = active;
    }

    get blob(): Buffer {
        return this.profiles[this.active];
    }

    public requestsFor(command: ProfileCommand): Frame[] {
        return this.requests.filter((request) => request.command === command);
    }

    public async exchange(frame: Buffer, _timeoutMs: number): Promise<Buffer> {
        this.#inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.#inFlight);

        try {
            await new Promise<void>((resolve) => setImmediate(resolve));

            const request = decodeFrame(frame);

            this.requests.push(request);

            const faulted = this.fault?.(request, this);

            if (faulted instanceof Error) {
                throw faulted;
            }

            return faulted ?? this.#respond(request);
        } finally {
            this.#inFlight--;
        }
    }

    #respond(request: Frame): Buffer {
        switch (request.command) {
            case ProfileCommand.GET_PROFILE_DATA: {
                const length = Math.min(request.payload.byteLength, this.readLength);

                return encodeFrame(request.command, 0, request.address, this.blob.subarray(request.address, request.address + length));
            }
            case ProfileCommand.SET_PROFILE_DATA: {
                this.blob.set(request.payload, request.address);

                return encodeFrame(request.command, 0, request.address, request.payload);
            }
            case ProfileCommand.GET_ACTIVE_PROFILE: {
                return encodeFrame(request.command, 0, 0, Buffer.from([this.active]));
            }
            case ProfileCommand.SET_ACTIVE_PROFILE: {
                this.active = request.payload[0];

                return encodeFrame(request.command, 0, 0, request.payload);
            }
            default: {
                return errorResponse(request, 0xff);
            }
        }
    }
}
