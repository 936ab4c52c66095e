import { describe, it, expect, vi, beforeEach } from 'vitest'
import { EventEmitter } from 'events'

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

// A watcher whose file events are emitted by the test
class MockWatcher extends EventEmitter {
  close = vi.fn().mockResolvedValue(undefined)
}

let watchers: MockWatcher[] = []

vi.mock('chokidar', () => ({
  watch: vi.fn(() => {
    const watcher = new MockWatcher()
    watchers.push(watcher)
    return watcher
  }),
}))

import { watch } from 'chokidar'
import { createInboxService } from '../../../../src/main/services/inbox-service'

const INBOX = '/srv/inbox'

describe('InboxService', () => {
  let submit: ReturnType<typeof vi.fn>

  function submittedPaths(): string[] {
    return submit.mock.calls.map(([imagePath]) => imagePath)
  }

  beforeEach(() => {
    vi.clearAllMocks()
    watchers = []
    submit = vi.fn().mockResolvedValue(undefined)
  })

  describe('startWatching', () => {
    it('watches the top level of the directory and waits for writes to finish', async () => {
      const service = createInboxService(INBOX, submit, { stabilityThresholdMs: 800, pollIntervalMs: 50 })

      const started = service.startWatching()
      watchers[0].emit('ready')
      await started

      expect(watch).toHaveBeenCalledWith(INBOX, {
        persistent: true,
        ignoreInitial: false,
        depth: 0,
        awaitWriteFinish: { stabilityThreshold: 800, pollInterval: 50 },
      })
      expect(service.isWatching()).toBe(true)
    })

    it('uses the default write-finish timings', async () => {
      const service = createInboxService(INBOX, submit)

      const started = service.startWatching()
      watchers[0].emit('ready')
      await started

      expect(watch).toHaveBeenCalledWith(
        INBOX,
        expect.objectContaining({ awaitWriteFinish: { stabilityThreshold: 500, pollInterval: 100 } }),
      )
    })

    it('submits the images present at startup in name order once ready', async () => {
      const service = createInboxService(INBOX, submit)

      const started = service.startWatching()
      watchers[0].emit('add', `${INBOX}/frame-002.jpg`)
      watchers[0].emit('add', `${INBOX}/frame-001.PNG`)
      watchers[0].emit('add', `${INBOX}/notes.txt`)
      expect(submit).not.toHaveBeenCalled()

      watchers[0].emit('ready')

      await expect(started).resolves.toEqual([`${INBOX}/frame-001.PNG`, `${INBOX}/frame-002.jpg`])
      expect(submittedPaths()).toEqual([`${INBOX}/frame-001.PNG`, `${INBOX}/frame-002.jpg`])
    })

    it('does not start a second watcher', async () => {
      const service = createInboxService(INBOX, submit)

      const started = service.startWatching()
      watchers[0].emit('ready')
      await started

      await expect(service.startWatching()).resolves.toEqual([])
      expect(watch).toHaveBeenCalledTimes(1)
    })
  })

  describe('new files', () => {
    it('submits images as they settle and ignores other files', async () => {
      const service = createInboxService(INBOX, submit)
      const started = service.startWatching()
      watchers[0].emit('ready')
      await started

      watchers[0].emit('add', `${INBOX}/frame-003.webp`)
      watchers[0].emit('add', `${INBOX}/capture.log`)
      watchers[0].emit('add', `${INBOX}/frame-004.JPEG`)

      expect(submittedPaths()).toEqual([`${INBOX}/frame-003.webp`, `${INBOX}/frame-004.JPEG`])
    })

    it('keeps submitting after a submission fails', async () => {
      submit.mockRejectedValueOnce(new Error('service disposed'))
      const service = createInboxService(INBOX, submit)
      const started = service.startWatching()
      watchers[0].emit('ready')
      await started

      watchers[0].emit('add', `${INBOX}/a.jpg`)
      await Promise.resolve()
      watchers[0].emit('add', `${INBOX}/b.jpg`)

      expect(submittedPaths()).toEqual([`${INBOX}/a.jpg`, `${INBOX}/b.jpg`])
    })

    it('logs watcher errors instead of throwing', async () => {
      const service = createInboxService(INBOX, submit)
      const started = service.startWatching()
      watchers[0].emit('ready')
      await started

      expect(() => watchers[0].emit('error', new Error('EMFILE: too many open files'))).not.toThrow()
      expect(service.isWatching()).toBe(true)
    })
  })

  describe('stopWatching', () => {
    it('closes the watcher and ignores events that arrive afterwards', async () => {
      const service = createInboxService(INBOX, submit)
      const started = service.startWatching()
      watchers[0].emit('ready')
      await started

      await service.stopWatching()
      watchers[0].emit('add', `${INBOX}/late.jpg`)

      expect(watchers[0].close).toHaveBeenCalledTimes(1)
      expect(service.isWatching()).toBe(false)
      expect(submit).not.toHaveBeenCalled()
    })

    it('ends a start that has not finished its initial scan', async () => {
      const service = createInboxService(INBOX, submit)
      const started = service.startWatching()
      watchers[0].emit('add', `${INBOX}/a.jpg`)

      await service.stopWatching()
      watchers[0].emit('ready')

      await expect(started).resolves.toEqual([])
      expect(submit).not.toHaveBeenCalled()
    })

    it('is safe to call when not watching', async () => {
      const service = createInboxService(INBOX, submit)

      await expect(service.stopWatching()).resolves.toBeUndefined()
    })
  })
})
