import { ProfileConsts } from "../profile/consts.js";
import { profileFromBytes, profileToBytes } from "../profile/layout.js";
import type { PartialProfile, Profile, ReportRate } from "../profile/types.js";
import { OutOfRangeError } from "../protocol/errors.js";
import { logger } from "../utils/logger.js";
import type { TransferPlanner } from "./transfer-planner.js";

const NS = "profile-session";

export type SessionOptions = {
    /** Written report rates above this are lowered to it. Default: no limit */
    maxReportRate?: ReportRate;
};

/**
 * Access to the 4 stored profiles on top of a `TransferPlanner`.
 *
 * Only the active profile is addressable, so every operation switches to the requested profile first
 * and switches back to the previously active one afterwards, also when the operation fails.
 */
export class ProfileSession {
    readonly #planner: TransferPlanner;
    readonly #options: SessionOptions;

    constructor(planner: TransferPlanner, options: SessionOptions = {}) {
        this.#planner = planner;
        this.#options = options;
    }

    get planner(): TransferPlanner {
        return this.#planner;
    }

    #assertIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= ProfileConsts.STORED_PROFILES) {
            throw new OutOfRangeError("profileIndex", index);
        }
    }

    #clampReportRate(rate: ReportRate): ReportRate {
        const max = this.#options.maxReportRate;

        if (max !== undefined && rate > max) {
            logger.warning(`Report rate ${rate}Hz unsupported by device, reducing to ${max}Hz`, NS);

            return max;
        }

        return rate;
    }

    /**
     * Run `task` once per index with that profile active, then restore the profile that was active before.
     * When `task` fails, a failed restore is logged and the task's error is thrown.
     */
    async #visit<T>(indices: readonly number[], task: (index: number) => Promise<T>): Promise<T[]> {
        for (const index of indices) {
            this.#assertIndex(index);
        }

        const previous = await this.#planner.getActiveProfile();
        const results: T[] = [];
        let active = previous;

        try {
            for (const index of indices) {
                if (active !== index) {
                    await this.#planner.setActiveProfile(index);

                    active = index;
                }

                results.push(await task(index));
            }
        } catch (error) {
            if (active !== previous) {
                try {
                    await this.#planner.setActiveProfile(previous);
                } catch (restoreError) {
                    logger.error(
                        `Failed to restore active profile ${previous}: ${restoreError instanceof Error ? restoreError.message : String(restoreError)}`,
                        NS,
                    );
                }
            }

            throw error;
        }

        if (active !== previous) {
            await this.#planner.setActiveProfile(previous);
        }

        return results;
    }

    async #visitOne<T>(index: number, task: () => Promise<T>): Promise<T> {
        const [result] = await this.#visit([index], task);

        return result;
    }

    /**
     * @param index 0-3
     */
    public async readProfile(index: number): Promise<Profile> {
        return await this.#visitOne(index, async () => profileFromBytes(await this.#planner.readProfile()));
    }

    /**
     * Overwrite the whole profile at `index`.
     */
    public async writeProfile(index: number, profile: Profile): Promise<void> {
        // encode before touching the device
        const blob = profileToBytes({ ...profile, reportRate: this.#clampReportRate(profile.reportRate) });

        await this.#visitOne(index, async () => {
            await this.#planner.writeProfile(blob);
        });
    }

    /**
     * Read-merge-write of the profile at `index`.
     * @returns the profile as written
     */
    public async writePartialProfile(index: number, patch: PartialProfile): Promise<Profile> {
        const clamped: PartialProfile = patch.reportRate === undefined ? patch : { ...patch, reportRate: this.#clampReportRate(patch.reportRate) };

        return await this.#visitOne(index, async () => profileFromBytes(await this.#planner.writePartial(clamped)));
    }

    /**
     * @returns the 4 stored profiles, in index order
     */
    public async readAllProfiles(): Promise<Profile[]> {
        return await this.#visit(storedIndices(), async () => profileFromBytes(await this.#planner.readProfile()));
    }

    /**
     * Overwrite all 4 stored profiles. Every profile is encoded before the first frame is sent.
     */
    public async writeAllProfiles(profiles: readonly Profile[]): Promise<void> {
        if (profiles.length !== ProfileConsts.STORED_PROFILES) {
            throw new OutOfRangeError("profiles.length", profiles.length);
        }

        const blobs = profiles.map((profile) => profileToBytes({ ...profile, reportRate: this.#clampReportRate(profile.reportRate) }));

        await this.#visit(storedIndices(), async (index) => {
            await this.#planner.writeProfile(blobs[index]);
        });
    }

    /**
     * @returns index of the active profile, 0-3
     */
    public async getActiveProfile(): Promise<number> {
        return await this.#planner.getActiveProfile();
    }

    /**
     * @param index 0-3
     */
    public async setActiveProfile(index: number): Promise<void> {
        await this.#planner.setActiveProfile(index);
    }
}

function storedIndices(): number[] {
    return Array.from({ length: ProfileConsts.STORED_PROFILES }, (_, i) => i);
}
