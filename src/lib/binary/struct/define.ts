import { Struct, type StructOptions, type StructType, type StructTypes } from "./struct";

export function defineStruct<Values extends Record<string, unknown>>(input: StructTypes<Values>, options: Partial<StructOptions> = {}) {
    return new Struct<Values>(input, options)
}

/**
 * Returns the type with a callable that narrows its bitLength, ie. `UINT8(4)` is a 4-bit unsigned integer
 */
export function defineStructType<T>(input: StructType<T>) {
    return Object.assign((bitLength: number): StructType<T> => {

        if (input.bitLength < bitLength) {
            throw new Error(`cannot define, bitLength "${bitLength}" is larger than type size "${input.bitLength}".`)
        }

        return { ...input, bitLength };
    }, input)
}
