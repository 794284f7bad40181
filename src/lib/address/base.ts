import { uint8_equals } from "../binary/uint8-array";

export abstract class BaseAddress {
    static ADDRESS_LENGTH = 0;

    readonly buffer: Uint8Array;

    constructor(input: Uint8Array) {
        this.buffer = input;
    }

    equals(other: BaseAddress): boolean {
        return uint8_equals(this.buffer, other.buffer);
    }

    abstract toString(): string;
}
