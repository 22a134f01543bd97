import { ConnectTimeoutError } from '@dockwire/protocol'

/**
 * The part of net.Socket the connect guard touches.
 */
export interface ConnectingSocket {
  readonly connecting: boolean
  destroy(error?: Error): unknown
  once(event: 'connect' | 'close', listener: () => void): unknown
}

/**
 * Destroy `socket` with ConnectTimeoutError unless it connects within
 * `timeoutMs`. A timeout of 0 disables the guard.
 */
export function armConnectTimeout(socket: ConnectingSocket, timeoutMs: number): void {
  if (timeoutMs <= 0 || !socket.connecting) {
    return
  }

  const timer = setTimeout(() => {
    socket.destroy(new ConnectTimeoutError(`Connect timed out after ${timeoutMs}ms`))
  }, timeoutMs)
  timer.unref()

  const clear = (): void => clearTimeout(timer)
  socket.once('connect', clear)
  socket.once('close', clear)
}
