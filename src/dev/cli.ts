import { readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { isReportRate } from "../profile/fields.js";
import { partialProfileFromJson, profilesFromJson, reviveBuffers } from "../profile/json.js";
import { ProfileSession, type SessionOptions } from "../transfer/profile-session.js";
import { DEFAULT_TRANSFER_OPTIONS, TransferPlanner, type TransferOptions } from "../transfer/transfer-planner.js";
import { openFirstCompatibleDevice } from "./hid-transport.js";

type Conf = {
    path: string | undefined;
    transfer: Partial<TransferOptions>;
    session: SessionOptions;
};

function printHelp(shouldThrow: boolean): void {
    console.log("\nRead:");
    console.log("    dev:cli get [profile min=1 max=4]");
    console.log("    dev:cli get-active");

    console.log("\nWrite:");
    console.log("    dev:cli set [profile min=1 max=4] [profile.json]");
    console.log("    dev:cli set-active <profile min=1 max=4>");

    console.log("\n- Profiles are printed/read as JSON, byte arrays as {type: 'Buffer', data: [...]}");
    console.log("- Following ENV vars are read: LAMZU_HID_PATH, LAMZU_TIMEOUT_MS, LAMZU_RETRIES, LAMZU_PARTIAL_WRITE, LAMZU_MAX_REPORT_RATE");

    if (shouldThrow) {
        throw new Error("Invalid parameters");
    }
}

function parseProfileNumber(arg: string | undefined): number {
    const profile = arg === undefined ? Number.NaN : Number.parseInt(arg, 10);

    if (!(profile >= 1 && profile <= 4)) {
        throw new Error("Invalid profile: [1..4]");
    }

    // 1-based on the command line, 0-based on the device
    return profile - 1;
}

function readConf(): Conf {
    const env = process.env;
    const conf: Conf = { path: env.LAMZU_HID_PATH || undefined, transfer: {}, session: {} };

    if (env.LAMZU_TIMEOUT_MS) {
        conf.transfer.timeoutMs = Number.parseInt(env.LAMZU_TIMEOUT_MS, 10);
    }

    if (env.LAMZU_RETRIES) {
        conf.transfer.retries = Number.parseInt(env.LAMZU_RETRIES, 10);
    }

    if (env.LAMZU_PARTIAL_WRITE === "full" || env.LAMZU_PARTIAL_WRITE === "changed") {
        conf.transfer.partialWrite = env.LAMZU_PARTIAL_WRITE;
    }

    if (env.LAMZU_MAX_REPORT_RATE) {
        const rate = Number.parseInt(env.LAMZU_MAX_REPORT_RATE, 10);

        if (!isReportRate(rate)) {
            throw new Error("Invalid LAMZU_MAX_REPORT_RATE: [125|250|500|1000]");
        }

        conf.session.maxReportRate = rate;
    }

    return conf;
}

async function run(args: string[]): Promise<void> {
    const command = args[0];

    if (command === undefined || command === "help") {
        printHelp(command === undefined);
        return;
    }

    if (command !== "get" && command !== "get-active" && command !== "set" && command !== "set-active") {
        printHelp(true);
    }

    const conf = readConf();

    console.error("Starting with conf:", JSON.stringify({ ...DEFAULT_TRANSFER_OPTIONS, ...conf }));

    const transport = await openFirstCompatibleDevice(conf.path);
    const session = new ProfileSession(
        new TransferPlanner(transport, {
            ...conf.transfer,
            onProgress: (done, total) => {
                process.stderr.write(`\r${Math.floor((done / total) * 100)}%`);

                if (done === total) {
                    process.stderr.write("\n");
                }
            },
        }),
        conf.session,
    );

    try {
        switch (command) {
            case "get": {
                if (args.length > 2) {
                    printHelp(true);
                }

                const profiles = args[1] === undefined ? await session.readAllProfiles() : [await session.readProfile(parseProfileNumber(args[1]))];

                console.log(JSON.stringify(profiles.length === 1 ? profiles[0] : profiles, undefined, 2));
                break;
            }

            case "get-active": {
                console.log(`Active profile: ${(await session.getActiveProfile()) + 1}`);
                break;
            }

            case "set": {
                if (args.length > 3) {
                    printHelp(true);
                }

                const withProfile = args[1] !== undefined && /^\d+$/.test(args[1]);
                const file = withProfile ? args[2] : args[1];

                if (!withProfile && args.length > 2) {
                    printHelp(true);
                }

                const input: unknown = JSON.parse(readFileSync(file ?? process.stdin.fd, "utf8"), reviveBuffers);

                if (withProfile) {
                    const written = await session.writePartialProfile(parseProfileNumber(args[1]), partialProfileFromJson(input));

                    console.log(JSON.stringify(written, undefined, 2));
                } else {
                    await session.writeAllProfiles(profilesFromJson(input));
                }

                break;
            }

            case "set-active": {
                if (args.length !== 2) {
                    printHelp(true);
                }

                await session.setActiveProfile(parseProfileNumber(args[1]));
                console.log(`Active profile: ${args[1]}`);
                break;
            }
        }
    } finally {
        await transport.close();
    }
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
    run(process.argv.slice(2)).catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
}
