import { KeyedMutex } from '../../src/services/KeyedMutex'

const tick = () => new Promise<void>(resolve => setImmediate(resolve))

describe('KeyedMutex', () => {
  it('runs holders of the same key one at a time, in arrival order', async () => {
    const mutex = new KeyedMutex()
    const events: string[] = []
    const job = (name: string) => mutex.runExclusive('k', async () => {
      events.push(`${name}:start`)
      await tick()
      events.push(`${name}:end`)
      return name
    })

    const results = await Promise.all([job('a'), job('b'), job('c')])

    expect(results).toEqual(['a', 'b', 'c'])
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end'])
    expect(mutex.pending('k')).toBe(0)
  })

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex()
    const events: string[] = []
    let releaseA: () => void = () => undefined
    const a = mutex.runExclusive('a', () => new Promise<void>(resolve => { releaseA = resolve }).then(() => { events.push('a') }))
    await mutex.runExclusive('b', async () => { events.push('b') })
    releaseA()
    await a
    expect(events).toEqual(['b', 'a'])
  })

  it('releases the lock when the holder throws', async () => {
    const mutex = new KeyedMutex()
    await expect(mutex.runExclusive('k', async () => { throw new Error('boom') })).rejects.toThrow('boom')
    await expect(mutex.runExclusive('k', () => 42)).resolves.toBe(42)
    expect(mutex.pending('k')).toBe(0)
  })
})
