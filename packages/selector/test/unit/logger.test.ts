import { PassThrough } from 'stream'
import pino from 'pino'
import * as loggerModule from '../../src/utils/logger'

function makeCapture() {
  const stream = new PassThrough()
  const chunks: string[] = []
  stream.on('data', (c: Buffer) => chunks.push(c.toString()))
  return { stream, chunks }
}

function lines(chunks: string[]): Array<Record<string, unknown>> {
  return chunks.join('').split(/\n/).filter(Boolean).map(l => JSON.parse(l))
}

describe('logger utilities', () => {
  let capture: ReturnType<typeof makeCapture>
  let originalLogger: pino.BaseLogger

  beforeEach(() => {
    capture = makeCapture()
    originalLogger = loggerModule.getLogger()
    loggerModule.setLogger(pino({ level: 'debug' }, capture.stream))
  })

  afterEach(() => {
    loggerModule.setLogger(originalLogger)
  })

  test('logRefresh logs info on success and warn on error', () => {
    loggerModule.logRefresh({ key: 'k', forced: false, fetched: 4, eligible: 2, latency_ms: 5 })
    loggerModule.logRefresh({ key: 'k', forced: true, fetched: 0, eligible: 0, error: 'boom' })
    const [ok, failed] = lines(capture.chunks)
    expect(ok.event).toBe('catalog.refresh')
    expect(ok.eligible).toBe(2)
    // pino info is 30, warn is 40
    expect(ok.level).toBe(30)
    expect(failed.level).toBe(40)
    expect(failed.error).toBe('boom')
  })

  test('logSelection writes an infinite score as text', () => {
    loggerModule.logSelection({ candidate: 'a', total_pulls: 3, score: Number.POSITIVE_INFINITY })
    const [line] = lines(capture.chunks)
    expect(line.event).toBe('router.select')
    expect(line.score).toBe('Infinity')
    expect(line.level).toBe(20)
  })

  test('logCheckpoint warns on failure', () => {
    loggerModule.logCheckpoint({ key: 'router_state.json', op: 'load', ok: false, error: 'connection refused' })
    const [line] = lines(capture.chunks)
    expect(line.event).toBe('router.checkpoint')
    expect(line.op).toBe('load')
    expect(line.level).toBe(40)
  })

  test('logReward logs the running mean', () => {
    loggerModule.logReward({ candidate: 'b', reward: 1, pulls: 2, mean_reward: 0.75 })
    const [line] = lines(capture.chunks)
    expect(line).toMatchObject({ event: 'router.reward', candidate: 'b', pulls: 2, mean_reward: 0.75 })
  })
})
