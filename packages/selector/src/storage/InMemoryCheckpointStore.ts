import { CheckpointStore } from './CheckpointStore'

export class InMemoryCheckpointStore implements CheckpointStore {
  private blobs: Map<string, Uint8Array> = new Map()

  async save(key: string, data: Uint8Array): Promise<void> {
    // copy so later mutation by the caller cannot change the stored snapshot
    this.blobs.set(key, Uint8Array.from(data))
  }

  async load(key: string): Promise<Uint8Array | undefined> {
    const blob = this.blobs.get(key)
    return blob ? Uint8Array.from(blob) : undefined
  }

  keys(): string[] {
    return Array.from(this.blobs.keys())
  }
}

export default InMemoryCheckpointStore
