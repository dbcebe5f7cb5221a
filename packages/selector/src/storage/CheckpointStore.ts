/** Named-blob persistence for router checkpoints. `save` overwrites. */
export interface CheckpointStore {
  save(key: string, data: Uint8Array): Promise<void>
  load(key: string): Promise<Uint8Array | undefined>
}
