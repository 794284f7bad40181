import { describe, expect, test } from "vitest";
import { IPV4Address } from "../../lib/address/ipv4";
import { calculateChecksum } from "../../lib/binary/checksum";
import { uint8_concat, uint8_fromString } from "../../lib/binary/uint8-array";
import { ChecksumMismatchError, LengthOverflowError } from "../../lib/header/errors";
import { TCPFlags } from "../../lib/header/tcp/flags";
import { tcp_checksum, tcp_verify } from "../../lib/header/tcp/checksum";
import { tcp_assembleSegment } from "../../lib/header/tcp/builder";
import { tcp_serialize, type TCPHeader } from "../../lib/header/tcp/tcp";

const SADDR = new IPV4Address("192.168.1.1");
const DADDR = new IPV4Address("192.168.1.2");

function getTcp(): TCPHeader {
    return {
        sport: 49320,
        dport: 8080,
        seqnum: 305419896,
        acknum: 2271560481,
        flags: TCPFlags.SYN.union(TCPFlags.ACK),
        window: 255,
        csum: 0,
    };
}

/** pseudo-header written out by hand: saddr, daddr, zero, protocol 6, length */
function pseudo(len: number): Uint8Array {
    return new Uint8Array([192, 168, 1, 1, 192, 168, 1, 2, 0, 6, len >> 8, len & 0xff]);
}

describe("TCP Checksum", () => {
    test("non zero", () => {
        let checksum = tcp_checksum(SADDR, DADDR, getTcp(), uint8_fromString("Hello, TCP!"));

        expect(checksum).not.eq(0);
        expect(checksum).eq(0x6f66);
    })

    test("stored checksum is treated as zero", () => {
        let payload = uint8_fromString("Hello, TCP!");

        expect(tcp_checksum(SADDR, DADDR, { ...getTcp(), csum: 0xf00d }, payload)).eq(0x6f66);
    })

    test("all zero header still covers the pseudo-header", () => {
        let zero = new IPV4Address("0.0.0.0");
        let hdr: TCPHeader = { sport: 0, dport: 0, seqnum: 0, acknum: 0, flags: TCPFlags.NONE, window: 0, csum: 0 };

        // protocol 6 + length 20 + data offset word 0x5000
        expect(tcp_checksum(zero, zero, hdr, new Uint8Array(0))).eq(0xafe5);
    })

    test("equals the internet checksum of pseudo-header, header and payload", () => {
        let payload = uint8_fromString("GET / HTTP/1.1\r\n");
        let expected = calculateChecksum(uint8_concat([pseudo(20 + payload.byteLength), tcp_serialize(getTcp()), payload]));

        expect(tcp_checksum(SADDR, DADDR, getTcp(), payload)).eq(expected);
    })

    test("odd length payload is padded with a zero octet", () => {
        let payload = uint8_fromString("abc");
        let padded = uint8_concat([payload, new Uint8Array(1)]);

        // the length field still carries the unpadded length
        let expected = calculateChecksum(uint8_concat([pseudo(23), tcp_serialize(getTcp()), padded]));

        expect(tcp_checksum(SADDR, DADDR, getTcp(), payload)).eq(expected);
        expect(tcp_checksum(SADDR, DADDR, getTcp(), payload)).eq(0x53ae);
    })

    test("summing a finalized segment yields zero", () => {
        let payload = uint8_fromString("Hello, TCP!");
        let hdr = { ...getTcp(), csum: tcp_checksum(SADDR, DADDR, getTcp(), payload) };
        let segment = tcp_assembleSegment(hdr, payload);

        expect(calculateChecksum(uint8_concat([pseudo(segment.byteLength), segment]))).eq(0);
    })

    test("addresses are part of the checksum", () => {
        let payload = uint8_fromString("Hello, TCP!");

        expect(tcp_checksum(DADDR, SADDR, getTcp(), payload)).eq(0x6f66);
        expect(tcp_checksum(SADDR, new IPV4Address("192.168.1.3"), getTcp(), payload)).not.eq(0x6f66);
    })

    test("length overflow", () => {
        expect(() => tcp_checksum(SADDR, DADDR, getTcp(), new Uint8Array(65516))).toThrow(LengthOverflowError);
        expect(() => tcp_checksum(SADDR, DADDR, getTcp(), new Uint8Array(65516))).toThrow("TCP: length 65536 exceeds 65535");
        expect(() => tcp_checksum(SADDR, DADDR, getTcp(), new Uint8Array(65515))).not.toThrow();
    })
})

describe("TCP Checksum verification", () => {
    test("matching checksum", () => {
        let payload = uint8_fromString("Hello, TCP!");
        let hdr = { ...getTcp(), csum: 0x6f66 };

        expect(tcp_verify(SADDR, DADDR, hdr, payload)).toBeNull();
    })

    test("mismatching checksum", () => {
        let payload = uint8_fromString("Hello, TCP!");
        let hdr = { ...getTcp(), csum: 0xf00d };

        let mismatch = tcp_verify(SADDR, DADDR, hdr, payload);

        expect(mismatch).toBeInstanceOf(ChecksumMismatchError);
        expect(mismatch?.expected).eq(0x6f66);
        expect(mismatch?.received).eq(0xf00d);
        expect(mismatch?.message).eq("TCP: checksum mismatch; expected 0x6f66, received 0xf00d");
    })

    test("modified payload", () => {
        let payload = uint8_fromString("Hello, TCP!");
        let hdr = { ...getTcp(), csum: 0x6f66 };

        expect(tcp_verify(SADDR, DADDR, hdr, uint8_fromString("Hello, TCP?"))).toBeInstanceOf(ChecksumMismatchError);
        expect(tcp_verify(SADDR, DADDR, hdr, payload)).toBeNull();
    })
})
