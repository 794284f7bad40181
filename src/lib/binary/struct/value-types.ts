import { StructValueError } from "./struct";
import { defineStructType } from "./define";
import { uint8_fromNumber, uint8_toNumber } from "../uint8-array";

function defineUINT(bitLength: number) {
    return defineStructType<number>({
        bitLength: bitLength,
        setter(v) {
            if (!Number.isInteger(v)) {
                throw new StructValueError("value must be an integer", v)
            }
            if (v < 0) {
                throw new StructValueError("value must be positive!", v)
            }
            if (v >= 2 ** this.bitLength) {
                throw new StructValueError("value does not fit in bits", v)
            }

            return uint8_fromNumber(v, Math.ceil(this.bitLength / 8));
        },
        getter(buf) {
            return uint8_toNumber(buf)
        }
    })
};

export const UINT8 = defineUINT(8);
export const UINT16 = defineUINT(16);
export const UINT32 = defineUINT(32);
