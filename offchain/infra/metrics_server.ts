import http from 'http';
import { collectProcessMetrics, registry } from './metrics';
import { errorMessage } from './errors';
import { log } from './logger';

export type ReadinessProbe = () => boolean;

export function startMetricsServer(port: number, isReady: ReadinessProbe = () => true): http.Server {
  collectProcessMetrics();
  const srv = http.createServer(async (req, res) => {
    if (req.url === '/metrics') {
      try {
        const data = await registry.metrics();
        res.writeHead(200, { 'Content-Type': registry.contentType });
        return res.end(data);
      } catch (e) {
        res.writeHead(500);
        return res.end(errorMessage(e));
      }
    }
    if (req.url === '/live') {
      res.writeHead(200);
      return res.end('ok');
    }
    if (req.url === '/ready') {
      const ready = isReady();
      res.writeHead(ready ? 200 : 503);
      return res.end(ready ? 'ok' : 'not-ready');
    }
    res.writeHead(404);
    res.end();
  });
  srv.on('error', (err) => log.error({ err: errorMessage(err), port }, 'metrics-server-error'));
  srv.listen(port, () => log.info({ port }, 'metrics-server-listening'));
  return srv;
}
