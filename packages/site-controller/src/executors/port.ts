import { Socket } from "node:net"

export interface PortProbeResult {
  connected: boolean
  host: string
  port: number
  responseTime?: number
  error?: string
}

/**
 * Open a short-lived TCP connection and report how it went. Never rejects.
 */
export function probePort(port: number, timeoutSeconds: number, host = "127.0.0.1"): Promise<PortProbeResult> {
  const timeout = timeoutSeconds * 1000

  return new Promise(resolve => {
    const startTime = Date.now()
    const socket = new Socket()

    const finish = (result: Omit<PortProbeResult, "host" | "port">) => {
      clearTimeout(timer)
      socket.removeAllListeners()
      if (!socket.destroyed) {
        socket.destroy()
      }
      resolve({ host, port, ...result })
    }

    const timer = setTimeout(() => finish({ connected: false, error: "Connection timeout" }), timeout)

    socket.setTimeout(timeout)
    socket.on("connect", () => finish({ connected: true, responseTime: Date.now() - startTime }))
    socket.on("error", error => finish({ connected: false, error: error.message }))
    socket.on("timeout", () => finish({ connected: false, error: "Socket timeout" }))

    try {
      socket.connect(port, host)
    } catch (error) {
      finish({ connected: false, error: error instanceof Error ? error.message : String(error) })
    }
  })
}

/**
 * Whether something accepts connections on host:port within the timeout.
 * Timeouts and refusals both map to false.
 */
export async function testPortReachable(port: number, timeoutSeconds: number, host = "127.0.0.1"): Promise<boolean> {
  const result = await probePort(port, timeoutSeconds, host)
  return result.connected
}
