import { describe, expect, it } from "vitest";
import {
    decodeBoolSetting,
    decodeButtonAction,
    decodeColor,
    decodeDpiPreset,
    decodeLiftOffDistance,
    decodePeakPerformanceTime,
    decodeReportRate,
    decodeU8Setting,
    dpiFromRaw,
    dpiToRaw,
    encodeButtonAction,
    encodeColor,
    encodeDpiPreset,
    encodeLiftOffDistance,
    encodePeakPerformanceTime,
    encodeReportRate,
    encodeSetting,
    encodeU8Setting,
    isReportRate,
} from "../../src/profile/fields.js";
import type { ButtonAction } from "../../src/profile/types.js";
import { ChecksumMismatchError, OutOfRangeError } from "../../src/protocol/errors.js";

describe("Field codecs", () => {
    describe("u8 settings", () => {
        it("appends the checksum", () => {
            // 255 - (171 + 5) = 0x4f
            expect(encodeU8Setting(5, "value").toString("hex")).toStrictEqual("054f");
        });

        it("decodes", () => {
            expect(decodeU8Setting(Buffer.from("054f", "hex"), "value")).toStrictEqual(5);
        });

        it("rejects a bad checksum", () => {
            expect(() => decodeU8Setting(Buffer.from("0550", "hex"), "value")).toThrowError(new ChecksumMismatchError("value", 0x4f, 0x50));
        });

        it("enforces range", () => {
            expect(() => encodeU8Setting(16, "debounceMs", 0, 15)).toThrowError(new OutOfRangeError("debounceMs", 16));
            expect(() => decodeU8Setting(encodeU8Setting(9, "dpiCount"), "dpiCount", 1, 8)).toThrowError(new OutOfRangeError("dpiCount", 9));
        });

        it("takes only 0 and 1 as booleans", () => {
            expect(decodeBoolSetting(encodeU8Setting(1, "motionSync"), "motionSync")).toStrictEqual(true);
            expect(decodeBoolSetting(encodeU8Setting(0, "motionSync"), "motionSync")).toStrictEqual(false);
            expect(() => decodeBoolSetting(encodeU8Setting(2, "motionSync"), "motionSync")).toThrowError(new OutOfRangeError("motionSync", 2));
        });
    });

    describe("report rate", () => {
        it.each([
            [1000, "0153"],
            [500, "0252"],
            [250, "0450"],
            [125, "084c"],
        ] as const)("encodes %iHz as %s", (rate, hex) => {
            expect(encodeReportRate(rate).toString("hex")).toStrictEqual(hex);
            expect(decodeReportRate(Buffer.from(hex, "hex"))).toStrictEqual(rate);
        });

        it("rejects masks with more than one bit", () => {
            expect(() => decodeReportRate(encodeSetting(Buffer.from([0x03])))).toThrowError(new OutOfRangeError("reportRate", 3));
        });

        it("narrows numbers", () => {
            expect(isReportRate(500)).toStrictEqual(true);
            expect(isReportRate(2000)).toStrictEqual(false);
        });
    });

    describe("lift-off distance", () => {
        it("accepts 1 and 2", () => {
            expect(decodeLiftOffDistance(encodeLiftOffDistance(2))).toStrictEqual(2);
            expect(() => decodeLiftOffDistance(encodeU8Setting(3, "liftOffDistance"))).toThrowError(new OutOfRangeError("liftOffDistance", 3));
        });
    });

    describe("peak performance time", () => {
        it("stores units of 10 seconds", () => {
            expect(encodePeakPerformanceTime(60).toString("hex")).toStrictEqual("064e");
            expect(decodePeakPerformanceTime(Buffer.from("064e", "hex"))).toStrictEqual(60);
        });

        it("rejects non-multiples of 10", () => {
            expect(() => encodePeakPerformanceTime(65)).toThrowError(new OutOfRangeError("peakPerformanceTime", 65));
        });

        it("rejects over 2550", () => {
            expect(() => encodePeakPerformanceTime(2560)).toThrowError(new OutOfRangeError("peakPerformanceTime", 256));
        });
    });

    describe("DPI", () => {
        it("maps raw 0 to 50", () => {
            expect(dpiFromRaw(0)).toStrictEqual(50);
            expect(dpiFromRaw(2)).toStrictEqual(150);
            expect(dpiFromRaw(255)).toStrictEqual(12800);
        });

        it("maps back to raw", () => {
            expect(dpiToRaw(50)).toStrictEqual(0);
            expect(dpiToRaw(150)).toStrictEqual(2);
            expect(dpiToRaw(12800)).toStrictEqual(255);
        });

        it.each([0, 75, 12850, -50])("rejects %i", (dpi) => {
            expect(() => dpiToRaw(dpi)).toThrowError(new OutOfRangeError("dpi", dpi));
        });

        it("encodes presets", () => {
            // [7, 15, 0]: 171 + 22 = 193 => 0x3e
            expect(encodeDpiPreset({ x: 400, y: 800, reserved: 0 }).toString("hex")).toStrictEqual("070f003e");
            expect(decodeDpiPreset(Buffer.from("070f003e", "hex"))).toStrictEqual({ x: 400, y: 800, reserved: 0 });
        });

        it("decodes zeroed presets as 50 DPI", () => {
            expect(decodeDpiPreset(encodeSetting(Buffer.from([0, 2, 0])))).toStrictEqual({ x: 50, y: 150, reserved: 0 });
        });

        it("names the axis in errors", () => {
            expect(() => encodeDpiPreset({ x: 400, y: 401, reserved: 0 }, "dpiPresets[3]")).toThrowError(new OutOfRangeError("dpiPresets[3].y", 401));
        });
    });

    describe("colors", () => {
        it("encodes RGB", () => {
            // 171 + 255 + 16 = 442 => 186 => 0x45
            expect(encodeColor({ red: 0xff, green: 0x00, blue: 0x10 }).toString("hex")).toStrictEqual("ff001045");
            expect(decodeColor(Buffer.from("ff001045", "hex"))).toStrictEqual({ red: 0xff, green: 0x00, blue: 0x10 });
        });

        it("rejects channels over 255", () => {
            expect(() => encodeColor({ red: 256, green: 0, blue: 0 })).toThrowError(new OutOfRangeError("color.red", 256));
        });
    });

    describe("button actions", () => {
        const vectors: [ButtonAction, string][] = [
            [{ type: "disabled" }, "000000"],
            [{ type: "leftClick" }, "010100"],
            [{ type: "rightClick" }, "010200"],
            [{ type: "middleClick" }, "010400"],
            [{ type: "backClick" }, "010800"],
            [{ type: "forwardClick" }, "011000"],
            [{ type: "dpiLoop" }, "020100"],
            [{ type: "dpiUp" }, "020200"],
            [{ type: "dpiDown" }, "020300"],
            [{ type: "scrollLeft" }, "030100"],
            [{ type: "scrollRight" }, "030200"],
            [{ type: "fireKey", interval: 50, repeat: 3 }, "043203"],
            [{ type: "keyCombo" }, "050000"],
            [{ type: "macro", index: 15 }, "060f00"],
            [{ type: "pollRateLoop" }, "070000"],
            [{ type: "dpiLock", dpiStep: 0x17 }, "0a1700"],
            [{ type: "scrollUp" }, "0b0100"],
            [{ type: "scrollDown" }, "0b0200"],
        ];

        for (const [action, hex] of vectors) {
            it(`encodes ${action.type} as ${hex}`, () => {
                const slot = encodeButtonAction(action);

                expect(slot.subarray(0, 3).toString("hex")).toStrictEqual(hex);
                expect(decodeButtonAction(slot)).toStrictEqual(action);
            });
        }

        it("appends the checksum", () => {
            expect(encodeButtonAction({ type: "leftClick" }).toString("hex")).toStrictEqual("01010052");
        });

        it("ignores padding of actions without sub-code", () => {
            expect(decodeButtonAction(encodeSetting(Buffer.from([0x05, 0x12, 0x34])))).toStrictEqual({ type: "keyCombo" });
            expect(decodeButtonAction(encodeSetting(Buffer.from([0x00, 0x09, 0x09])))).toStrictEqual({ type: "disabled" });
            expect(decodeButtonAction(encodeSetting(Buffer.from([0x06, 0x02, 0x34])))).toStrictEqual({ type: "macro", index: 2 });
        });

        it("rejects unknown sub-codes", () => {
            expect(() => decodeButtonAction(encodeSetting(Buffer.from([0x01, 0x03, 0x00])))).toThrowError(new OutOfRangeError("buttonAction[0x01]", 3));
            expect(() => decodeButtonAction(encodeSetting(Buffer.from([0x0b, 0x00, 0x00])), "buttonActions[4]")).toThrowError(
                new OutOfRangeError("buttonActions[4][0x0b]", 0),
            );
        });

        it("rejects unknown codes", () => {
            expect(() => decodeButtonAction(encodeSetting(Buffer.from([0x09, 0x00, 0x00])))).toThrowError(new OutOfRangeError("buttonAction.code", 9));
        });

        it("enforces parameter ranges", () => {
            expect(() => encodeButtonAction({ type: "fireKey", interval: 9, repeat: 0 })).toThrowError(new OutOfRangeError("buttonAction.interval", 9));
            expect(() => encodeButtonAction({ type: "fireKey", interval: 10, repeat: 4 })).toThrowError(new OutOfRangeError("buttonAction.repeat", 4));
            expect(() => encodeButtonAction({ type: "macro", index: 16 })).toThrowError(new OutOfRangeError("buttonAction.index", 16));
            expect(() => encodeButtonAction({ type: "dpiLock", dpiStep: 0 })).toThrowError(new OutOfRangeError("buttonAction.dpiStep", 0));
            expect(() => encodeButtonAction({ type: "dpiLock", dpiStep: 0x18 })).toThrowError(new OutOfRangeError("buttonAction.dpiStep", 0x18));
            expect(() => decodeButtonAction(encodeSetting(Buffer.from([0x04, 0x09, 0x00])))).toThrowError(new OutOfRangeError("buttonAction.interval", 9));
        });

        it("rejects a bad checksum", () => {
            expect(() => decodeButtonAction(Buffer.from("01010053", "hex"))).toThrowError(ChecksumMismatchError);
        });
    });
});
