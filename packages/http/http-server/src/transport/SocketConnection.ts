import { Connection } from '@wind/http-api';
import { LogType, WindLogger } from '@wind/core-util';

/**
 * The parts of a net.Socket the transport uses.
 */
export interface ClientSocket {
    on(event: 'data', listener: (data: Buffer) => void): unknown;
    on(event: 'error', listener: (err: Error) => void): unknown;
    off(event: 'data', listener: (data: Buffer) => void): unknown;
    write(data: Buffer, callback: (err?: Error | null) => void): unknown;
    end(): unknown;
}

/**
 * Connection over a TCP socket.
 *
 * The completion callback fires once the socket has flushed the bytes, or
 * failed to; a failed write is logged and still completes so the resource
 * releases its state.
 */
export class SocketConnection implements Connection {
    constructor(
        private readonly socket: ClientSocket,
        private readonly logger: WindLogger,
    ) {}

    write(data: Buffer, onComplete: () => void): void {
        this.socket.write(data, (err?: Error | null) => {
            if (err) {
                this.logger.log(`[SocketConnection] write failed: ${err.message}`, LogType.WARN);
            }
            onComplete();
        });
    }

    close(): void {
        this.socket.end();
    }
}
