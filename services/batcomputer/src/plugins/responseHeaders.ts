import fp from 'fastify-plugin';

export interface ResponseHeadersOptions {
  version: string;
}

/**
 * Stamps every response, errors and CORS preflights included, with
 * `X-Process-Time` (seconds, 4 decimals) and `X-API-Version`.
 */
export const responseHeaders = fp<ResponseHeadersOptions>(
  async (app, opts) => {
    app.addHook('onSend', async (req, reply, payload) => {
      const seconds = reply.elapsedTime / 1000;
      reply.header('X-Process-Time', seconds.toFixed(4));
      reply.header('X-API-Version', opts.version);
      req.log.debug({ url: req.url, seconds }, 'Request processed');
      return payload;
    });
  },
  { name: 'response-headers' },
);
