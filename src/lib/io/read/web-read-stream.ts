import { logger } from '../../utils/logger';
import { ReadStream } from './file-system';

/**
 * ReadStream over a web ReadableStream, such as a fetch response body or a tar
 * entry body. Chunks larger than the target are kept for the next pull.
 */
class WebReadStream extends ReadStream {
    private reader: ReadableStreamDefaultReader<Uint8Array> | null;
    private buffer: Uint8Array | null = null;
    private bufferOffset: number = 0;
    private closed: boolean = false;

    constructor(body: ReadableStream<Uint8Array> | null, expectedSize?: number) {
        super(expectedSize);
        this.reader = body ? body.getReader() : null;
    }

    async pull(target: Uint8Array): Promise<number> {
        if (this.closed || !this.reader) {
            return 0;
        }

        let targetOffset = 0;

        // First, consume any leftover data from previous read
        if (this.buffer && this.bufferOffset < this.buffer.length) {
            const remaining = this.buffer.length - this.bufferOffset;
            const toCopy = Math.min(remaining, target.length);
            target.set(this.buffer.subarray(this.bufferOffset, this.bufferOffset + toCopy));
            this.bufferOffset += toCopy;
            targetOffset += toCopy;

            if (this.bufferOffset >= this.buffer.length) {
                this.buffer = null;
                this.bufferOffset = 0;
            }
        }

        while (targetOffset < target.length) {
            const { done, value } = await this.reader.read();

            if (done) {
                break;
            }

            const toCopy = Math.min(value.length, target.length - targetOffset);
            target.set(value.subarray(0, toCopy), targetOffset);
            targetOffset += toCopy;

            // Store leftover for next pull
            if (toCopy < value.length) {
                this.buffer = value;
                this.bufferOffset = toCopy;
                break;
            }
        }

        this.bytesRead += targetOffset;

        return targetOffset;
    }

    override close(): void {
        if (this.closed) return;
        this.closed = true;
        if (this.reader) {
            // cancel() rejects if the stream already errored
            this.reader.cancel().catch((err: unknown) => logger.debug('stream cancel failed:', err));
            this.reader = null;
        }
        this.buffer = null;
    }
}

export { WebReadStream };
