/**
 * Seeds of the 8-bit sum complement checksum.
 * Settings and frames use SETTING; key combo and macro blocks (and frames addressing them) use MACRO.
 */
export const enum ChecksumSeed {
    SETTING = 171,
    MACRO = 181,
}

/**
 * 8-bit sum complement: `255 - ((initial + sum(bytes)) mod 256)`.
 *
 * @param start inclusive
 * @param end exclusive
 */
export function checksum(data: Uint8Array, initial: number, start = 0, end = data.byteLength): number {
    let sum = initial & 0xff;

    for (let i = start; i < end; i++) {
        sum = (sum + data[i]) & 0xff;
    }

    return 0xff - sum;
}

export function verifyChecksum(data: Uint8Array, initial: number, claimed: number): boolean {
    return checksum(data, initial) === claimed;
}
