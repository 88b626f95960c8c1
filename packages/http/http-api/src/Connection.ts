/**
 * Connection - The transport seen by a Resource.
 *
 * write() does not block; onComplete is invoked exactly once after the bytes
 * have been handed off. Until then the pending write owns the Resource's
 * buffers and connection.
 */
export interface Connection {
    write(data: Buffer, onComplete: () => void): void;

    close(): void;
}
