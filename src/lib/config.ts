/**
 * Runtime configuration, read once from the environment
 */

export const config = {
    /** `TCP_SEGMENT_DEBUG=1` enables debug logging */
    debug: process.env.TCP_SEGMENT_DEBUG === "1",
};
