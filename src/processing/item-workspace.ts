/**
 * Transient buffers held while one work item is processed.
 *
 * In-memory counterpart of a per-item staging directory: `release()` in
 * the pipeline's `finally` is where staged files would be removed.
 */
export class ItemWorkspace {
  input?: Buffer;
  output?: Buffer;

  /**
   * Drop both buffers.
   *
   * @returns Number of bytes released
   */
  release(): number {
    const released = (this.input?.length ?? 0) + (this.output?.length ?? 0);
    this.input = undefined;
    this.output = undefined;
    return released;
  }
}
