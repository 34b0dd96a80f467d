import { describe, expect, it, vi } from "vitest";
import { profileFromBytes } from "../../src/profile/layout.js";
import { DeviceError, OutOfRangeError } from "../../src/protocol/errors.js";
import { ProfileCommand } from "../../src/protocol/frame.js";
import { ProfileSession } from "../../src/transfer/profile-session.js";
import { TransferPlanner } from "../../src/transfer/transfer-planner.js";
import { logger } from "../../src/utils/logger.js";
import { createProfile, errorResponse, FakeDevice } from "../utils.js";

/** Indexes sent with SET_ACTIVE_PROFILE, in order */
function activeTrail(device: FakeDevice): number[] {
    return device.requestsFor(ProfileCommand.SET_ACTIVE_PROFILE).map((request) => request.payload[0]);
}

describe("ProfileSession", () => {
    describe("readProfile", () => {
        it("switches to the profile and back", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));

            expect(await session.readProfile(2)).toStrictEqual(createProfile(2));
            expect(activeTrail(device)).toStrictEqual([2, 0]);
            expect(device.active).toStrictEqual(0);
            expect(device.requests[0].command).toStrictEqual(ProfileCommand.GET_ACTIVE_PROFILE);
        });

        it("does not switch when already active", async () => {
            const device = new FakeDevice(undefined, 1);
            const session = new ProfileSession(new TransferPlanner(device));

            expect(await session.readProfile(1)).toStrictEqual(createProfile(1));
            expect(activeTrail(device)).toStrictEqual([]);
        });

        it("rejects invalid indexes", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));

            await expect(session.readProfile(4)).rejects.toThrowError(new OutOfRangeError("profileIndex", 4));
            expect(device.requests.length).toStrictEqual(0);
        });

        it("restores the active profile after a failure", async () => {
            const device = new FakeDevice(undefined, 1);
            const session = new ProfileSession(new TransferPlanner(device));
            device.fault = (request) => (request.command === ProfileCommand.GET_PROFILE_DATA ? errorResponse(request, 1) : undefined);

            await expect(session.readProfile(3)).rejects.toThrowError(new DeviceError(1, ProfileCommand.GET_PROFILE_DATA, 0));
            expect(activeTrail(device)).toStrictEqual([3, 1]);
            expect(device.active).toStrictEqual(1);
        });

        it("logs a failed restore and raises the original error", async () => {
            const device = new FakeDevice();
            const errorSpy = vi.spyOn(logger, "error").mockImplementation(() => {});
            const session = new ProfileSession(new TransferPlanner(device));
            device.fault = (request) => {
                if (request.command === ProfileCommand.GET_PROFILE_DATA) {
                    return errorResponse(request, 1);
                }

                return request.command === ProfileCommand.SET_ACTIVE_PROFILE && request.payload[0] === 0 ? errorResponse(request, 2) : undefined;
            };

            await expect(session.readProfile(3)).rejects.toThrowError(new DeviceError(1, ProfileCommand.GET_PROFILE_DATA, 0));
            expect(errorSpy).toHaveBeenCalledWith("Failed to restore active profile 0: Device error code=2 (cmd=0x0f address=0x0000)", "profile-session");
            expect(device.active).toStrictEqual(3);
        });

        it("raises a failed restore after a successful operation", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));
            device.fault = (request) =>
                request.command === ProfileCommand.SET_ACTIVE_PROFILE && request.payload[0] === 0 ? errorResponse(request, 2) : undefined;

            await expect(session.readProfile(3)).rejects.toThrowError(new DeviceError(2, ProfileCommand.SET_ACTIVE_PROFILE, 0));
        });
    });

    describe("writeProfile", () => {
        it("writes the profile at the index only", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));
            const before = Buffer.from(device.profiles[0]);

            await session.writeProfile(1, { ...createProfile(3), debounceMs: 8 });

            expect(profileFromBytes(device.profiles[1])).toStrictEqual({ ...createProfile(3), debounceMs: 8 });
            expect(device.profiles[0]).toStrictEqual(before);
            expect(activeTrail(device)).toStrictEqual([1, 0]);
        });

        it("lowers report rates over the limit", async () => {
            const device = new FakeDevice();
            const warningSpy = vi.spyOn(logger, "warning").mockImplementation(() => {});
            const session = new ProfileSession(new TransferPlanner(device), { maxReportRate: 500 });

            await session.writeProfile(1, createProfile(1));

            expect(profileFromBytes(device.profiles[1]).reportRate).toStrictEqual(500);
            expect(warningSpy).toHaveBeenCalledWith("Report rate 1000Hz unsupported by device, reducing to 500Hz", "profile-session");
        });

        it("keeps report rates within the limit", async () => {
            const device = new FakeDevice();
            const warningSpy = vi.spyOn(logger, "warning").mockImplementation(() => {});
            const session = new ProfileSession(new TransferPlanner(device), { maxReportRate: 1000 });

            await session.writeProfile(1, { ...createProfile(1), reportRate: 250 });

            expect(profileFromBytes(device.profiles[1]).reportRate).toStrictEqual(250);
            expect(warningSpy).not.toHaveBeenCalled();
        });

        it("validates before touching the device", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));

            await expect(session.writeProfile(1, { ...createProfile(1), dpiCount: 0 })).rejects.toThrowError(new OutOfRangeError("dpiCount", 0));
            expect(device.requests.length).toStrictEqual(0);
        });
    });

    describe("writePartialProfile", () => {
        it("merges into the profile at the index", async () => {
            const device = new FakeDevice();
            vi.spyOn(logger, "warning").mockImplementation(() => {});
            const session = new ProfileSession(new TransferPlanner(device), { maxReportRate: 250 });

            const written = await session.writePartialProfile(1, { dpiIndex: 3, reportRate: 1000 });

            expect(written).toStrictEqual({ ...createProfile(1), dpiIndex: 3, reportRate: 250 });
            expect(profileFromBytes(device.profiles[1])).toStrictEqual(written);
            expect(device.active).toStrictEqual(0);
        });
    });

    describe("all profiles", () => {
        it("reads all profiles in order", async () => {
            const device = new FakeDevice(undefined, 2);
            const session = new ProfileSession(new TransferPlanner(device));

            expect(await session.readAllProfiles()).toStrictEqual([createProfile(0), createProfile(1), createProfile(2), createProfile(3)]);
            expect(activeTrail(device)).toStrictEqual([0, 1, 2, 3, 2]);
            expect(device.active).toStrictEqual(2);
        });

        it("writes all profiles in order", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));

            await session.writeAllProfiles([createProfile(3), createProfile(2), createProfile(1), createProfile(0)]);

            expect(device.profiles.map((blob) => profileFromBytes(blob).dpiIndex)).toStrictEqual([3, 2, 1, 0]);
            expect(activeTrail(device)).toStrictEqual([1, 2, 3, 0]);
        });

        it("requires exactly 4 profiles", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));

            await expect(session.writeAllProfiles([createProfile(), createProfile(), createProfile()])).rejects.toThrowError(
                new OutOfRangeError("profiles.length", 3),
            );
            expect(device.requests.length).toStrictEqual(0);
        });

        it("encodes every profile before writing", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));

            await expect(
                session.writeAllProfiles([createProfile(), createProfile(), createProfile(), { ...createProfile(), debounceMs: 99 }]),
            ).rejects.toThrowError(new OutOfRangeError("debounceMs", 99));
            expect(device.requests.length).toStrictEqual(0);
        });
    });

    describe("active profile", () => {
        it("gets and sets", async () => {
            const device = new FakeDevice();
            const session = new ProfileSession(new TransferPlanner(device));

            await session.setActiveProfile(3);

            expect(await session.getActiveProfile()).toStrictEqual(3);
            expect(device.active).toStrictEqual(3);
        });
    });
});
