export * from './factory'
export * from './registry'
export * from './errors'
