import { S3Client, GetObjectCommand, PutObjectCommand, S3ClientConfig } from '@aws-sdk/client-s3'
import { CheckpointStore } from './CheckpointStore'

export type S3CheckpointStoreOptions = {
  bucket: string
  /** key prefix inside the bucket; surrounding slashes are ignored */
  prefix?: string
  client?: S3Client
  clientConfig?: S3ClientConfig
}

/** Checkpoints as objects at `prefix/key` in an S3-compatible bucket (AWS, MinIO, ...). */
export class S3CheckpointStore implements CheckpointStore {
  readonly bucket: string
  readonly prefix: string
  private readonly client: S3Client

  constructor(opts: S3CheckpointStoreOptions) {
    this.bucket = opts.bucket
    this.prefix = (opts.prefix ?? '').replace(/^\/+|\/+$/g, '')
    this.client = opts.client ?? new S3Client(opts.clientConfig ?? {})
  }

  objectKey(key: string): string {
    return this.prefix ? `${this.prefix}/${key}` : key
  }

  async save(key: string, data: Uint8Array): Promise<void> {
    await this.client.send(new PutObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key), Body: data }))
  }

  async load(key: string): Promise<Uint8Array | undefined> {
    try {
      const res = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: this.objectKey(key) }))
      if (!res.Body) return undefined
      return await res.Body.transformToByteArray()
    } catch (e) {
      if (e instanceof Error && (e.name === 'NoSuchKey' || e.name === 'NotFound')) return undefined
      throw e
    }
  }
}

export default S3CheckpointStore
