/**
 * WriteBuffer - Ordered, double-ended container of byte chunks.
 *
 * Handlers append body chunks as they produce them; the response header block
 * is pushed on the front with appendLeft(), then gather() merges everything
 * into one contiguous chunk so the transport receives a single write.
 *
 * Invariant: totalBytes() always equals the sum of the chunk lengths.
 */
export class WriteBuffer implements Iterable<Buffer> {
    private chunks: Buffer[] = [];
    private byteCount = 0;

    append(chunk: Buffer): void {
        this.chunks.push(chunk);
        this.byteCount += chunk.length;
    }

    appendLeft(chunk: Buffer): void {
        this.chunks.unshift(chunk);
        this.byteCount += chunk.length;
    }

    totalBytes(): number {
        return this.byteCount;
    }

    /**
     * Number of chunks currently held.
     */
    get length(): number {
        return this.chunks.length;
    }

    isEmpty(): boolean {
        return this.chunks.length === 0;
    }

    /**
     * Coalesce the first `size` bytes into a single chunk at the front.
     * A chunk that straddles the boundary is split; its tail stays second.
     * Asking for more bytes than are buffered gathers everything.
     */
    gather(size: number): void {
        if (this.chunks.length <= 1 || size <= 0) {
            return;
        }

        const merged: Buffer[] = [];
        let remaining = size;
        while (remaining > 0 && this.chunks.length > 0) {
            const head = this.chunks[0];
            if (head.length <= remaining) {
                merged.push(head);
                this.chunks.shift();
                remaining -= head.length;
            } else {
                merged.push(head.subarray(0, remaining));
                this.chunks[0] = head.subarray(remaining);
                remaining = 0;
            }
        }

        this.chunks.unshift(Buffer.concat(merged));
    }

    /**
     * Remove and return the front chunk.
     * Popping an empty buffer is a programming error.
     */
    popLeft(): Buffer {
        const chunk = this.chunks.shift();
        if (chunk === undefined) {
            throw new Error('popLeft() called on an empty WriteBuffer');
        }
        this.byteCount -= chunk.length;
        return chunk;
    }

    clear(): void {
        this.chunks = [];
        this.byteCount = 0;
    }

    [Symbol.iterator](): Iterator<Buffer> {
        return this.chunks[Symbol.iterator]();
    }
}
