import { uint8_mutateWriteBits, uint8_readBits } from "../uint8-array";

export class StructValueError extends Error {
    constructor(message: string, public value: unknown) {
        super(`cannot set; ${message}`);
        this.name = "StructValueError";
    }
}

export type StructOptions = {
    /** big endian is true by default if false the bytes of every value are stored in reverse order */
    bigEndian: boolean;
}

const STRUCT_DEFAULT_OPTIONS: StructOptions = {
    bigEndian: true,
}

export interface StructType<T> {
    /** value to be set when an instance of a struct is created, if not set struct will default to 0 */
    defaultValue?: T;
    /** bitLength of the value type, determines how many bits the value contain */
    bitLength: number;
    /** function to be called when a struct is retrieving a value */
    getter(buf: Uint8Array, options: StructOptions): T;
    /** function to be called when a struct is setting a value */
    setter(value: T, options: StructOptions): Uint8Array;
}

export type StructTypes<Values> = { [K in keyof Values]: StructType<Values[K]> };
export type StructKey<Values> = Extract<keyof Values, string>;

/**
 * A fixed size, bit packed record. Fields are laid out in definition order without any padding.
 *
 * RULES: total bitLength MUST be a multiple of 8.
 */
export class Struct<Values extends Record<string, unknown>> {
    readonly order: Array<StructKey<Values>> = [];

    private options: StructOptions;
    private buffer: Uint8Array;
    private types: StructTypes<Values>;
    private offsets = new Map<string, number>();
    private bitSize = 0;

    constructor(types: StructTypes<Values>, options: Partial<StructOptions> = {}) {
        this.options = { ...STRUCT_DEFAULT_OPTIONS, ...options };
        this.types = types;

        for (let key in types) {
            if (types[key].bitLength <= 0) {
                throw new Error(`cannot define struct; "${key}" has no size`)
            }

            this.order.push(key);
            this.offsets.set(key, this.bitSize);
            this.bitSize += types[key].bitLength;
        }

        if (this.bitSize % 8 !== 0) {
            throw new Error("cannot define struct; total bitLength MUST be a multiple of 8")
        }

        this.buffer = new Uint8Array(this.getMinSize());
        this.setDefaultValues();
    }

    private setDefaultValues() {
        for (let key of this.order) {
            this.assign(key, this.types[key].defaultValue);
        }
    }

    private assign<Key extends StructKey<Values>>(key: Key, value: Values[Key] | undefined) {
        if (value !== undefined) {
            this.set(key, value);
        }
    }

    private getBitOffset(key: string): number {
        let offset = this.offsets.get(key);
        if (offset === undefined) {
            throw new Error("Cannot find key " + key)
        }
        return offset;
    }

    getMinSize(): number {
        return this.bitSize / 8;
    }

    get size() {
        return this.buffer.length;
    }

    get<Key extends StructKey<Values>>(key: Key): Values[Key] {
        let type = this.types[key];
        let buf = uint8_readBits(this.buffer, this.getBitOffset(key), type.bitLength);

        if (!this.options.bigEndian) {
            buf.reverse();
        }

        return type.getter(buf, this.options);
    }

    set<Key extends StructKey<Values>>(key: Key, value: Values[Key]): this {
        let type = this.types[key];
        let buf = new Uint8Array(type.setter(value, this.options));

        if (buf.byteLength != Math.ceil(type.bitLength / 8)) {
            throw new StructValueError("value does not fit in bits", value)
        }

        if (!this.options.bigEndian) {
            buf.reverse();
        }

        uint8_mutateWriteBits(this.buffer, this.getBitOffset(key), type.bitLength, buf);

        return this;
    }

    create(values: Partial<Values>, options: Partial<StructOptions> = {}): Struct<Values> {
        let struct = new Struct<Values>(this.types, { ...this.options, ...options });

        for (let key of this.order) {
            struct.assign(key, values[key]);
        }

        return struct;
    }

    /** Reads the struct from the start of `buf`, bytes past the struct size are ignored */
    from(buf: Uint8Array, options: Partial<StructOptions> = {}): Struct<Values> {
        if (buf.byteLength < this.getMinSize()) {
            throw new Error("too few bytes to satisfy struct. " + `${buf.byteLength} < ${this.getMinSize()}`)
        }

        let struct = new Struct<Values>(this.types, { ...this.options, ...options });
        struct.buffer = new Uint8Array(buf.subarray(0, this.getMinSize()));

        return struct;
    }

    getBuffer(): Uint8Array {
        return this.buffer;
    }
}
