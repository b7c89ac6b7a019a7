import { exit } from 'node:process';

import { serve } from '@hono/node-server';

import { version } from '../../package.json';
import { createDataSource } from '../lib/data-source';
import { createFileServerApp, normalizeMountPath } from '../lib/server/routes';
import { logger } from '../lib/utils/logger';
import { type Arguments, parseArguments, usage } from './arguments';

const main = async () => {
    let args: Arguments;
    try {
        args = parseArguments(process.argv.slice(2));
    } catch (err) {
        logger.error(err instanceof Error ? err.message : err);
        logger.output(usage);
        exit(1);
    }

    if (args.help) {
        logger.output(usage);
        return;
    }

    if (args.version) {
        logger.output(`v${version}`);
        return;
    }

    logger.setQuiet(args.quiet);

    const source = await createDataSource(args.config);
    const app = createFileServerApp(source, args.serve.server);
    const mount = normalizeMountPath(args.serve.server.mountPath ?? '/files');

    serve({ fetch: app.fetch, port: args.serve.port, hostname: args.serve.host }, (info) => {
        logger.log(`serving ${source.kind} on http://${args.serve.host}:${info.port}${mount}/`);
    });
};

main().catch((err: unknown) => {
    logger.error(err);
    exit(1);
});
