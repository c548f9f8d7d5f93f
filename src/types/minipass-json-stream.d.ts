// minipass-json-stream ships no type declarations and has no @types package.
declare module 'minipass-json-stream' {
    type PathElement = string | number | boolean | RegExp | ((key: string) => boolean);

    class JSONStream {
        static parse(path?: string | PathElement[], map?: (value: unknown, path: unknown[]) => unknown): JSONStream;
        write(chunk: string | Buffer): boolean;
        end(): this;
        read(): unknown;
        on(event: 'error', listener: (error: Error) => void): this;
        on(event: string, listener: (...args: unknown[]) => void): this;
        [Symbol.asyncIterator](): AsyncIterator<unknown>;
    }

    export = JSONStream;
}
