import { Coordinator } from '@/coordinator/Coordinator';
import { WebServer } from '@/web/server';
import { logger } from '@/utils/logger';

export const WEB_STOP_TIMEOUT_MS = 5000;

/**
 * Stops the web server, then the coordinator. The coordinator is stopped even
 * when the web server fails or does not stop within `timeoutMs`, so the UDP
 * sockets and the poll task are always released.
 *
 * Resolves true for a clean shutdown.
 */
export async function shutdown(
  coordinator: Pick<Coordinator, 'stop'>,
  webServer: Pick<WebServer, 'stop'> | null,
  timeoutMs: number = WEB_STOP_TIMEOUT_MS
): Promise<boolean> {
  let clean = true;

  if (webServer) {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const outcome = await Promise.race([webServer.stop().then(() => 'stopped' as const), timeout]);
      if (outcome === 'timeout') {
        logger.warn({ timeoutMs }, 'Web server did not stop in time');
        clean = false;
      }
    } catch (error) {
      logger.error({ err: error }, 'Error stopping web server');
      clean = false;
    } finally {
      clearTimeout(timer);
    }
  }

  await coordinator.stop();
  return clean;
}
