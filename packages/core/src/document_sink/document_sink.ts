export type SinkWriteResult = {
  bytesWritten: number;
};

/**
 * Persists a serialized document. A failed write leaves no partial output.
 */
export interface DocumentSink {
  /** Name used in logs and messages (e.g. the file name). */
  readonly name: string;

  /**
   * @throws OutputWriteError when the destination cannot be written
   */
  write(content: string): Promise<SinkWriteResult>;
}
