import { describe, expect, test } from "vitest";
import { calculateChecksum, uint16_complement, uint16_fold, uint16_sum } from "../../lib/binary/checksum";

/**
 * First vectors from **stackoverflow** <https://stackoverflow.com/a/4114507>
 */

describe("Checksum", () => {
    test("Simplest Valid Value", () => {
        let buf = new Uint8Array(1);
        let expected = 0xffff;
        let actual = calculateChecksum(buf);

        expect(actual).toEqual(expected)
    })

    test("Valid Multi Byte Extrema", () => {
        let buf = new Uint8Array(2);
        buf[0] = 0x00, buf[1] = 0xff;

        let expected = 0xff00;
        let actual = calculateChecksum(buf);

        expect(actual).toEqual(expected);
    })

    test("Valid Example Message", () => {
        let buf = new Uint8Array([0xe3, 0x4f, 0x23, 0x96, 0x44, 0x27, 0x99, 0xf3]);

        let expected = 0x1aff;
        let actual = calculateChecksum(buf);

        expect(actual).toEqual(expected)
    })

    test("Valid Example Even Message With Carry From RFC1071", () => {
        let buf = new Uint8Array([0x00, 0x01, 0xf2, 0x03, 0xf4, 0xf5, 0xf6, 0xf7])

        let expected = 0x220d;
        let actual = calculateChecksum(buf);

        expect(actual).toBe(expected)
    })

    test("empty buffer", () => {
        expect(calculateChecksum(new Uint8Array(0))).toBe(0xffff);
    })
})

describe("uint16_sum", () => {
    test("big endian words", () => {
        expect(uint16_sum(new Uint8Array([0x12, 0x34, 0x00, 0x01]))).toBe(0x1235);
    })

    test("odd byte is the high byte of a zero padded word", () => {
        let odd = new Uint8Array([0x01, 0x02, 0xab]);
        let padded = new Uint8Array([0x01, 0x02, 0xab, 0x00]);

        expect(uint16_sum(odd)).toBe(0xac02);
        expect(uint16_sum(odd)).toBe(uint16_sum(padded));
    })

    test("continues an existing sum without folding", () => {
        let sum = uint16_sum(new Uint8Array([0xff, 0xff]));
        sum = uint16_sum(new Uint8Array([0xff, 0xff]), sum);

        expect(sum).toBe(0x1fffe);
    })

    test("summing in parts equals summing the whole", () => {
        let a = new Uint8Array([0xe3, 0x4f, 0x23, 0x96]);
        let b = new Uint8Array([0x44, 0x27, 0x99, 0xf3]);

        expect(uint16_complement(uint16_sum(b, uint16_sum(a)))).toBe(0x1aff);
    })
})

describe("uint16_fold", () => {
    test("no carry", () => {
        expect(uint16_fold(0xabcd)).toBe(0xabcd);
    })

    test("single carry", () => {
        expect(uint16_fold(0x2ddf0)).toBe(0xddf2);
    })

    test("carry produced by folding is folded again", () => {
        expect(uint16_fold(0x1ffff)).toBe(0x0001);
    })

    test("complement", () => {
        expect(uint16_complement(0x2ddf0)).toBe(0x220d);
        expect(uint16_complement(0xffff)).toBe(0);
    })
})
