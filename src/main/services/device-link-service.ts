import { SerialPort } from 'serialport'
import log from 'electron-log/node'
import { encodeClassificationFrame, encodeTextMessage } from '@core/protocol/device-frame'
import type { Category } from '@shared/types'
import {
  DEFAULT_BAUD_RATE,
  DEVICE_MAX_RECONNECT_ATTEMPTS,
  DEVICE_RECONNECT_COOLDOWN,
  DEVICE_RECONNECT_RESET_TIME,
} from '@shared/constants/thresholds'
import type { AppStore } from '../store/app-store'

// @DEV-GUIDE: Serial link to the sorting microcontroller (Arduino-class board).
// Outgoing: 4-byte classification frames and newline-terminated text (core/protocol).
// Incoming: raw bytes are forwarded to the onData handler; the device may print debug text.
//
// Sends resolve to false instead of throwing when the port is closed or a write fails,
// so a missing or unplugged device never stops classification.
//
// Auto-reconnect: an unexpected close (cable pulled, board reset) triggers up to 3 reopen
// attempts with a 5s cooldown. The counter resets once the link has been stable for 60s.
// disconnect() is an intentional close and never reconnects.

const logger = log.scope('device-link')

export interface DeviceLinkOptions {
  path: string
  baudRate?: number
  /** Called once the reconnect attempts after an unexpected close are used up */
  onLinkLost?: (attempts: number) => void
}

export interface DeviceLinkService {
  connect(): Promise<void>
  disconnect(): Promise<void>
  isConnected(): boolean
  getPortPath(): string
  sendClassificationResult(category: Category): Promise<boolean>
  sendTextMessage(message: string): Promise<boolean>
  onData(handler: ((bytes: Buffer) => void) | null): void
}

export function createDeviceLinkService(
  options: DeviceLinkOptions,
  appStore: AppStore,
): DeviceLinkService {
  const baudRate = options.baudRate ?? DEFAULT_BAUD_RATE
  let port: SerialPort | null = null
  let dataHandler: ((bytes: Buffer) => void) | null = null
  let closing = false
  let reconnectCount = 0
  let lastReconnectTime = 0
  let reconnectTimer: ReturnType<typeof setTimeout> | null = null

  function openPort(): Promise<SerialPort> {
    return new Promise<SerialPort>((resolve, reject) => {
      const serialPort = new SerialPort({ path: options.path, baudRate, autoOpen: false })

      serialPort.on('data', (chunk: Buffer) => {
        dataHandler?.(chunk)
      })

      serialPort.on('error', (err: Error) => {
        logger.error('Serial port error', { path: options.path, error: err.message })
        appStore.setState({ deviceError: err.message })
      })

      serialPort.on('close', () => {
        if (port !== serialPort) return
        port = null
        appStore.setState({ deviceStatus: 'disconnected' })
        if (!closing) {
          logger.warn('Serial port closed unexpectedly', { path: options.path })
          scheduleReconnect()
        }
      })

      serialPort.open((err) => {
        if (err) {
          reject(err)
          return
        }
        resolve(serialPort)
      })
    })
  }

  async function connect(): Promise<void> {
    if (port?.isOpen) {
      logger.warn('Serial port already open', { path: options.path })
      return
    }

    closing = false
    appStore.setState({ deviceStatus: 'connecting', devicePort: options.path, deviceError: null })

    try {
      port = await openPort()
      appStore.setState({ deviceStatus: 'connected' })
      logger.info('Serial port opened', { path: options.path, baudRate })
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      appStore.setState({ deviceStatus: 'error', deviceError: message })
      logger.error('Failed to open serial port', { path: options.path, error: message })
      throw err instanceof Error ? err : new Error(message)
    }
  }

  function scheduleReconnect(): void {
    const now = Date.now()
    if (now - lastReconnectTime > DEVICE_RECONNECT_RESET_TIME) {
      reconnectCount = 0
    }

    if (reconnectCount >= DEVICE_MAX_RECONNECT_ATTEMPTS) {
      logger.error('Serial link failed permanently', { attempts: reconnectCount })
      appStore.setState({ deviceStatus: 'error', deviceError: 'Reconnect attempts exhausted' })
      options.onLinkLost?.(reconnectCount)
      return
    }

    reconnectCount++
    lastReconnectTime = now
    logger.warn(`Reconnecting serial link (${reconnectCount}/${DEVICE_MAX_RECONNECT_ATTEMPTS})`)

    reconnectTimer = setTimeout(() => {
      reconnectTimer = null
      connect().catch((err: unknown) => {
        logger.error('Serial reconnect failed', {
          error: err instanceof Error ? err.message : String(err),
        })
        scheduleReconnect()
      })
    }, DEVICE_RECONNECT_COOLDOWN)
  }

  async function disconnect(): Promise<void> {
    closing = true
    if (reconnectTimer) {
      clearTimeout(reconnectTimer)
      reconnectTimer = null
    }

    const current = port
    if (!current) return
    port = null

    if (current.isOpen) {
      await new Promise<void>((resolve) => {
        current.close((err) => {
          if (err) logger.warn('Error closing serial port', { error: err.message })
          resolve()
        })
      })
    }
    appStore.setState({ deviceStatus: 'disconnected' })
    logger.info('Serial port closed', { path: options.path })
  }

  function write(bytes: Uint8Array, description: string): Promise<boolean> {
    const current = port
    if (!current?.isOpen) {
      logger.warn('Device not connected, dropping message', { message: description })
      return Promise.resolve(false)
    }

    return new Promise<boolean>((resolve) => {
      current.write(Buffer.from(bytes), (writeErr) => {
        if (writeErr) {
          logger.error('Error sending data to device', { message: description, error: writeErr.message })
          resolve(false)
          return
        }
        current.drain((drainErr) => {
          if (drainErr) {
            logger.error('Error flushing data to device', { message: description, error: drainErr.message })
            resolve(false)
            return
          }
          resolve(true)
        })
      })
    })
  }

  return {
    connect,
    disconnect,
    isConnected: () => port?.isOpen ?? false,
    getPortPath: () => options.path,
    sendClassificationResult: (category) =>
      write(encodeClassificationFrame(category), `classification:${category}`),
    sendTextMessage: (message) => write(encodeTextMessage(message), `text:${message}`),
    onData: (handler) => {
      dataHandler = handler
    },
  }
}
