import { describe, it, expect, vi, beforeEach } from 'vitest'

// Mock electron-log
vi.mock('electron-log/node', () => ({
  default: {
    scope: () => ({
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    }),
  },
}))

import { createResultSink } from '../../../../src/main/services/result-sink'
import type { TallyLogService } from '../../../../src/main/services/tally-log-service'
import type { DeviceLinkService } from '../../../../src/main/services/device-link-service'
import type { FinalizedDecision } from '../../../../src/shared/types'

const decision: FinalizedDecision = {
  category: 'Metal',
  count: 3,
  sequence: 7,
  finalizedAt: new Date(2026, 2, 14, 9, 0, 0),
}

function createMockTallyLog() {
  return {
    initialize: vi.fn(),
    append: vi.fn().mockResolvedValue(true),
    getLogPath: vi.fn().mockReturnValue('/stats/waste_classification_stats.csv'),
  } satisfies TallyLogService
}

function createMockDeviceLink() {
  return {
    connect: vi.fn(),
    disconnect: vi.fn(),
    isConnected: vi.fn().mockReturnValue(true),
    getPortPath: vi.fn().mockReturnValue('/dev/ttyACM0'),
    sendClassificationResult: vi.fn().mockResolvedValue(true),
    sendTextMessage: vi.fn().mockResolvedValue(true),
    onData: vi.fn(),
  } satisfies DeviceLinkService
}

describe('ResultSink', () => {
  let tallyLog: ReturnType<typeof createMockTallyLog>
  let deviceLink: ReturnType<typeof createMockDeviceLink>

  beforeEach(() => {
    tallyLog = createMockTallyLog()
    deviceLink = createMockDeviceLink()
  })

  it('logs the decision and sends its frame', async () => {
    const sink = createResultSink(tallyLog, deviceLink)

    await expect(sink.handle(decision)).resolves.toEqual({ logged: true, sent: true })
    expect(tallyLog.append).toHaveBeenCalledWith(decision)
    expect(deviceLink.sendClassificationResult).toHaveBeenCalledWith('Metal')
  })

  it('still sends the frame when logging fails', async () => {
    tallyLog.append.mockResolvedValue(false)
    const sink = createResultSink(tallyLog, deviceLink)

    await expect(sink.handle(decision)).resolves.toEqual({ logged: false, sent: true })
    expect(deviceLink.sendClassificationResult).toHaveBeenCalledTimes(1)
  })

  it('still logs when the device is unavailable', async () => {
    deviceLink.sendClassificationResult.mockResolvedValue(false)
    const sink = createResultSink(tallyLog, deviceLink)

    await expect(sink.handle(decision)).resolves.toEqual({ logged: true, sent: false })
    expect(tallyLog.append).toHaveBeenCalledTimes(1)
  })

  it('only logs when no device link is configured', async () => {
    const sink = createResultSink(tallyLog, null)

    await expect(sink.handle(decision)).resolves.toEqual({ logged: true, sent: false })
  })

  it('flush waits for deliveries in flight', async () => {
    let finishAppend: (logged: boolean) => void = () => {}
    tallyLog.append.mockReturnValue(
      new Promise<boolean>((resolve) => {
        finishAppend = resolve
      }),
    )
    const sink = createResultSink(tallyLog, deviceLink)
    void sink.handle(decision)

    let flushed = false
    const flushing = sink.flush().then(() => {
      flushed = true
    })
    await Promise.resolve()
    expect(flushed).toBe(false)

    finishAppend(true)
    await flushing
    expect(flushed).toBe(true)
  })

  it('flush resolves immediately when idle', async () => {
    const sink = createResultSink(tallyLog, deviceLink)

    await expect(sink.flush()).resolves.toBeUndefined()
  })
})
