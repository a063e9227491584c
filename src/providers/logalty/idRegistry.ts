import { EnvelopeNotFoundError } from '../../errors.js';

/**
 * Bidirectional map between local envelope ids and Logalty request ids.
 *
 * Both directions change inside one synchronous method, so no caller can
 * observe an entry in one direction only. The registry lives in memory and
 * starts empty on every process start.
 */
export class EnvelopeIdRegistry {
  private readonly remoteByLocal = new Map<string, string>();
  private readonly localByRemote = new Map<string, string>();

  /**
   * Register a pairing confirmed by the remote platform. Any earlier pairing
   * of either id is dropped.
   */
  put(localId: string, remoteId: string): void {
    const previousRemote = this.remoteByLocal.get(localId);
    if (previousRemote !== undefined) {
      this.localByRemote.delete(previousRemote);
    }
    const previousLocal = this.localByRemote.get(remoteId);
    if (previousLocal !== undefined) {
      this.remoteByLocal.delete(previousLocal);
    }

    this.remoteByLocal.set(localId, remoteId);
    this.localByRemote.set(remoteId, localId);
  }

  remoteIdOf(localId: string): string {
    const remoteId = this.remoteByLocal.get(localId);
    if (remoteId === undefined) throw new EnvelopeNotFoundError(localId);
    return remoteId;
  }

  localIdOf(remoteId: string): string {
    const localId = this.localByRemote.get(remoteId);
    if (localId === undefined) throw new EnvelopeNotFoundError(remoteId);
    return localId;
  }

  has(localId: string): boolean {
    return this.remoteByLocal.has(localId);
  }

  /**
   * Remove a pairing. Returns false when the local id was not registered.
   */
  remove(localId: string): boolean {
    const remoteId = this.remoteByLocal.get(localId);
    if (remoteId === undefined) return false;

    this.remoteByLocal.delete(localId);
    this.localByRemote.delete(remoteId);
    return true;
  }

  get size(): number {
    return this.remoteByLocal.size;
  }

  clear(): void {
    this.remoteByLocal.clear();
    this.localByRemote.clear();
  }
}
