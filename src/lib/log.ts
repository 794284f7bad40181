import { config } from "./config";
import type { TCPHeader } from "./header/tcp/tcp";

export enum LogLevel {
    DEBUG = "DEBUG",
    WARN = "WARN",
    ERROR = "ERROR",
}

export class Logger {
    constructor(private debugEnabled: boolean = config.debug) { }

    private format(level: LogLevel, message: string, meta?: unknown): string {
        const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
        return `[${new Date().toISOString()}] [${level}] ${message}${metaStr}`;
    }

    /** Debug logs, only when `TCP_SEGMENT_DEBUG=1` */
    debug(message: string, meta?: unknown): void {
        if (this.debugEnabled) {
            console.log(this.format(LogLevel.DEBUG, message, meta));
        }
    }

    warn(message: string, meta?: unknown): void {
        console.warn(this.format(LogLevel.WARN, message, meta));
    }

    error(message: string, meta?: unknown): void {
        console.error(this.format(LogLevel.ERROR, message, meta));
    }

    /** Log segment details (debug only) */
    segment(direction: "→" | "←", peer: string, header: TCPHeader, payloadLength: number): void {
        if (!this.debugEnabled) return;

        this.debug(`${direction} ${peer} Segment`, {
            sport: header.sport,
            dport: header.dport,
            seqnum: header.seqnum,
            acknum: header.acknum,
            flags: header.flags.toString(),
            window: header.window,
            csum: `0x${header.csum.toString(16).padStart(4, "0")}`,
            payloadSize: `${payloadLength}B`,
        });
    }
}

export const logger = new Logger();
