import HID, { type HIDAsync } from "node-hid";
import { TransportError } from "../protocol/errors.js";
import { FrameConsts } from "../protocol/frame.js";
import type { ProfileTransport } from "../transfer/transfer-planner.js";
import { logger, toHex } from "../utils/logger.js";

const NS = "hid-transport";

const VENDOR_ID = 0x3554;
/** Atlantis Mini Pro (wired, wireless receiver) */
const SUPPORTED_PRODUCTS: readonly number[] = [0xf50d, 0xf50f];
/** Vendor-defined usage pages start here, the profile reports live on that interface */
const VENDOR_USAGE_PAGE_MIN = 0xff00;
const MAX_READS_PER_REQUEST = 3;

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Some platforms strip the report id from input reports, restore it.
 */
export function normalizeInputReport(raw: Buffer): Buffer {
    if (raw.byteLength === FrameConsts.SIZE - 1) {
        return Buffer.concat([Buffer.from([FrameConsts.REPORT_ID]), raw]);
    }

    if (raw.byteLength < FrameConsts.SIZE) {
        throw new TransportError(`Short read (${raw.byteLength} bytes)`, true);
    }

    return raw.subarray(0, FrameConsts.SIZE);
}

/**
 * `ProfileTransport` over a node-hid device handle: one output report out, one input report back.
 */
export class NodeHidTransport implements ProfileTransport {
    readonly #device: HIDAsync;
    readonly #path: string;

    private constructor(device: HIDAsync, path: string) {
        this.#device = device;
        this.#path = path;
    }

    get path(): string {
        return this.#path;
    }

    public static async open(path: string): Promise<NodeHidTransport> {
        logger.debug(() => `Opening HID device [path=${path}]`, NS);

        try {
            return new NodeHidTransport(await HID.HIDAsync.open(path), path);
        } catch (error) {
            throw new TransportError(`Failed to open HID device ${path}: ${errorMessage(error)}`, false, { cause: error });
        }
    }

    /**
     * A request may be answered by several input reports, reports with another id or answering another command are skipped.
     */
    public async exchange(frame: Buffer, timeoutMs: number): Promise<Buffer> {
        try {
            await this.#device.write(frame);
        } catch (error) {
            throw new TransportError(`HID write failed: ${errorMessage(error)}`, false, { cause: error });
        }

        for (let i = 0; i < MAX_READS_PER_REQUEST; i++) {
            const response = await this.#readReport(timeoutMs);

            if (response[0] === FrameConsts.REPORT_ID && response[FrameConsts.OFFSET_COMMAND] === frame[FrameConsts.OFFSET_COMMAND]) {
                return response;
            }

            logger.debug(() => `<--- REPORT[${toHex(response)}] skipped, not a response to cmd=0x${frame[FrameConsts.OFFSET_COMMAND].toString(16)}`, NS);
        }

        throw new TransportError(`No matching response in ${MAX_READS_PER_REQUEST} reports`, true);
    }

    async #readReport(timeoutMs: number): Promise<Buffer> {
        let response: Buffer | undefined;

        try {
            response = await this.#device.read(timeoutMs);
        } catch (error) {
            throw new TransportError(`HID read failed: ${errorMessage(error)}`, false, { cause: error });
        }

        if (response === undefined || response.byteLength === 0) {
            throw new TransportError(`No response within ${timeoutMs}ms`, true);
        }

        return normalizeInputReport(response);
    }

    public async close(): Promise<void> {
        await this.#device.close();
        logger.info(`Closed HID device ${this.#path}`, NS);
    }
}

/**
 * Open the first supported mouse, or the device at `path` when given.
 */
export async function openFirstCompatibleDevice(path?: string): Promise<NodeHidTransport> {
    if (path) {
        return await NodeHidTransport.open(path);
    }

    const devices = await HID.devicesAsync();
    const info = devices.find(
        (d) =>
            d.vendorId === VENDOR_ID && SUPPORTED_PRODUCTS.includes(d.productId) && d.usagePage !== undefined && d.usagePage >= VENDOR_USAGE_PAGE_MIN,
    );

    if (info?.path === undefined) {
        throw new TransportError("No compatible device found", false);
    }

    logger.info(
        `Found ${info.product ?? "device"} [vendorId=0x${info.vendorId.toString(16)} productId=0x${info.productId.toString(16)} path=${info.path}]`,
        NS,
    );

    return await NodeHidTransport.open(info.path);
}
