import log from 'electron-log/node'
import type { FinalizedDecision } from '@shared/types'
import type { TallyLogService } from './tally-log-service'
import type { DeviceLinkService } from './device-link-service'

const logger = log.scope('result-sink')

export interface ResultSinkReport {
  logged: boolean
  sent: boolean
}

export interface ResultSink {
  handle(decision: FinalizedDecision): Promise<ResultSinkReport>
  /** Resolves once every decision handed over so far has been delivered */
  flush(): Promise<void>
}

/**
 * Receives every finalized decision: appends it to the tally log and sends the
 * classification frame to the device. The two run independently, so a failing
 * log does not keep the item from being sorted, and vice versa.
 * A null device link means decisions are only logged.
 */
export function createResultSink(
  tallyLog: TallyLogService,
  deviceLink: DeviceLinkService | null,
): ResultSink {
  const inFlight = new Set<Promise<ResultSinkReport>>()

  async function deliver(decision: FinalizedDecision): Promise<ResultSinkReport> {
    const [logged, sent] = await Promise.all([
      tallyLog.append(decision),
      deviceLink ? deviceLink.sendClassificationResult(decision.category) : Promise.resolve(false),
    ])

    logger.info('Decision delivered', {
      category: decision.category,
      count: decision.count,
      logged,
      sent,
    })
    return { logged, sent }
  }

  return {
    handle(decision) {
      const delivery = deliver(decision)
      inFlight.add(delivery)
      const done = () => {
        inFlight.delete(delivery)
      }
      delivery.then(done, done)
      return delivery
    },
    async flush() {
      await Promise.allSettled([...inFlight])
    },
  }
}
