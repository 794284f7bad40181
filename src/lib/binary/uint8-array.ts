/**
 * REFERENCE: feross - buffer - <https://github.com/feross/buffer/blob/master/index.js>
 *
 * Plain `Uint8Array` helpers, everything here is big endian unless stated.
 */

/**
 * This function checks if the arrays are equal
 * @param a `Uint8Array`
 * @param b `Uint8Array`
 */
export function uint8_equals(a: Uint8Array, b: Uint8Array): boolean {
    if (a.byteLength != b.byteLength) {
        return false;
    }

    for (let i = 0; i < a.byteLength; i++) {
        if (a[i] != b[i]) {
            return false;
        }
    }

    return true;
}

export function uint8_concat(list: readonly Uint8Array[]): Uint8Array {
    let totalLength = list.reduce((sum, { byteLength }) => sum + byteLength, 0);

    let buffer = new Uint8Array(totalLength);

    let offset = 0;
    for (let part of list) {
        buffer.set(part, offset);
        offset += part.byteLength;
    }

    return buffer;
}

/**
 * Writes `n` into `len` bytes, most significant byte first.
 * Works for values up to 2^32 - 1, higher bits are dropped.
 */
export function uint8_fromNumber(n: number, len: number = 1): Uint8Array {
    let buf = new Uint8Array(len);

    let i = len;
    while (i-- > 0) {
        buf[i] = n & 0xff;
        n = n >>> 8;
    }

    return buf;
}

/** Reads the whole buffer as one unsigned big endian number */
export function uint8_toNumber(buf: Uint8Array): number {
    let n = 0;
    for (let i = 0; i < buf.byteLength; i++) {
        n = n * 256 + buf[i];
    }

    return n;
}

export function uint8_fromString(str: string): Uint8Array {
    let encoder = new TextEncoder();
    return encoder.encode(str)
}

export function uint8_toHex(buf: Uint8Array): string {
    let str = "";
    for (let i = 0; i < buf.byteLength; i++) {
        str += buf[i].toString(16).padStart(2, "0");
    }
    return str;
}

/**
 * Copies `bitLength` bits starting at `bitOffset` out of `source`.
 * The bits are right aligned in the returned buffer, which is `ceil(bitLength / 8)` bytes long.
 */
export function uint8_readBits(source: Uint8Array, bitOffset: number, bitLength: number): Uint8Array {
    let dest = new Uint8Array(Math.ceil(bitLength / 8));

    // byte aligned, nothing to shift
    if ((bitOffset & 7) == 0 && (bitLength & 7) == 0) {
        dest.set(source.subarray(bitOffset >> 3, (bitOffset + bitLength) >> 3));
        return dest;
    }

    let pad = dest.byteLength * 8 - bitLength;
    for (let i = 0; i < bitLength; i++) {
        let s = bitOffset + i, d = pad + i;
        let bit = (source[s >> 3] >> (7 - (s & 7))) & 1;
        dest[d >> 3] |= bit << (7 - (d & 7));
    }

    return dest;
}

/**
 * Writes the lowest `bitLength` bits of `value` into `target` starting at `bitOffset`.
 * Bits outside the range are left untouched.
 */
export function uint8_mutateWriteBits(target: Uint8Array, bitOffset: number, bitLength: number, value: Uint8Array): Uint8Array {
    if ((bitOffset & 7) == 0 && (bitLength & 7) == 0) {
        target.set(value.subarray(value.byteLength - (bitLength >> 3)), bitOffset >> 3);
        return target;
    }

    let pad = value.byteLength * 8 - bitLength;
    for (let i = 0; i < bitLength; i++) {
        let s = pad + i, d = bitOffset + i;
        let bit = (value[s >> 3] >> (7 - (s & 7))) & 1;
        let mask = 1 << (7 - (d & 7));

        if (bit) target[d >> 3] |= mask;
        else target[d >> 3] &= ~mask;
    }

    return target;
}
