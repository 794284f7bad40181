/**
 * Internet Checksum (RFC 1071 - <https://datatracker.ietf.org/doc/html/rfc1071>)
 *
 * Algorithm is
 * 1) apply a 16-bit 1's complement sum over all octets (adjacent 8-bit pairs [A,B], final odd length is [A,0])
 * 2) fold the carries back into the lower 16 bits
 * 3) apply 1's complement to this final sum
 *
 * The sum is kept unfolded while adding so that several buffers can be summed in a row,
 * as long as every buffer but the last has an even length.
 */

/**
 * Adds the 16-bit big endian words of `buf` onto `sum`.
 * A trailing odd byte is treated as the high byte of a word with a zero low byte.
 */
export function uint16_sum(buf: Uint8Array, sum: number = 0): number {
    let i = 0, length = buf.byteLength;

    // Handle all pairs
    while (length > 1) {
        sum += (buf[i] << 8) | buf[i + 1];
        i += 2;
        length -= 2;
    }

    // Handle remaining byte in odd length buffers
    if (length > 0) {
        sum += buf[i] << 8;
    }

    return sum;
}

/** Adds the carries back until the sum fits in 16 bits */
export function uint16_fold(sum: number): number {
    while (sum > 0xffff) {
        sum = (sum & 0xffff) + Math.floor(sum / 0x10000);
    }

    return sum;
}

/** 1's complement of the folded `sum`, truncated to 16 bits */
export function uint16_complement(sum: number): number {
    return ~uint16_fold(sum) & 0xffff;
}

/**
 * Calculate the Internet Checksum of a buffer
 * @param buf The message
 * @return The checksum
 */
export function calculateChecksum(buf: Uint8Array): number {
    return uint16_complement(uint16_sum(buf));
}
