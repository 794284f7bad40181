import { describe, test, expect } from "vitest";
import { IPV4Address } from "../../lib/address/ipv4";
import { IPV4_ADDRESS } from "../../lib/struct-types/address";
import { defineStruct } from "../../lib/binary/struct";
import { uint8_toHex } from "../../lib/binary/uint8-array";

describe("IPV4 Address", () => {
    test("toString", () => {
        let addr = "9.0.0.2";
        let buf = new Uint8Array([9, 0, 0, 2]);
        expect(new IPV4Address(buf).toString()).eq(addr)
    })

    test("parser", () => {
        let addr = "192.168.30.179";
        expect(new IPV4Address(addr).toString()).eq(addr)
        expect(Array.from(IPV4Address.parse(" 10.0.0.1 "))).toEqual([10, 0, 0, 1])
    })

    test("invalid input", () => {
        expect(() => new IPV4Address("256.0.0.1")).toThrow();
        expect(() => new IPV4Address("10.0.0")).toThrow();
        expect(() => new IPV4Address(new Uint8Array(5))).toThrow();
        expect(IPV4Address.validate("10.0.0.1")).true;
        expect(IPV4Address.validate("10.0.0.")).false;
        expect(IPV4Address.validate(10)).false;
    })

    test("copies its input", () => {
        let buf = new Uint8Array([10, 0, 0, 1]);
        let addr = new IPV4Address(buf);
        buf[3] = 2;

        expect(addr.toString()).eq("10.0.0.1");
        expect(new IPV4Address(addr).equals(addr)).true;
        expect(addr.equals(new IPV4Address("10.0.0.2"))).false;
    })

    test("toJSON", () => {
        expect(JSON.stringify(new IPV4Address("127.0.0.1"))).eq(`{"type":"IPV4Address","address":"127.0.0.1"}`);
    })

    test("struct value type", () => {
        let st = defineStruct({ addr: IPV4_ADDRESS }).create({ addr: new IPV4Address("192.168.1.2") });

        expect(uint8_toHex(st.getBuffer())).eq("c0a80102");
        expect(st.get("addr").toString()).eq("192.168.1.2");
    })
})
