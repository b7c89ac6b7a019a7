import { parseArgs } from 'node:util';

import { type DataSourceConfig } from '../lib/data-source';
import { type FileServerOptions } from '../lib/types';

type ServeOptions = {
    port: number;
    host: string;
    server: FileServerOptions;
};

type Arguments = {
    help: boolean;
    version: boolean;
    quiet: boolean;
    config: DataSourceConfig;
    serve: ServeOptions;
};

const usage = `Serve files from a folder list, tar archive or remote URL over HTTP.

USAGE
  data-source [options]

BACKENDS (pick one; default serves the working directory)
  -d, --dir <path>        Folder to search, repeat for more (first match wins)
  -t, --tar <file>        Serve the contents of a tar archive
  -z, --gzip              The archive is gzip-compressed
      --scan              Scan the archive on every request instead of indexing it
  -u, --url <base>        Proxy files from a remote base URL

SERVER
  -p, --port <n>          Port to listen on (default 8080)
  -H, --host <name>       Interface to bind (default 127.0.0.1)
  -m, --mount <path>      URL prefix for files (default /files)
  -i, --index-file <f>    File served for directory requests (default index.html)

GENERAL
  -q, --quiet             Only print errors
  -v, --version           Print the version and exit
  -h, --help              Print this help and exit
`;

const parseInteger = (value: string, name: string): number => {
    const result = Number(value);
    if (!Number.isInteger(result)) {
        throw new Error(`Invalid integer value for --${name}: ${value}`);
    }
    return result;
};

/**
 * Parse command line arguments into a data source config and server options.
 * @param args - Arguments without the node and script entries
 * @returns The parsed arguments
 * @throws Error for unknown flags, conflicting backends or bad numbers
 */
const parseArguments = (args: string[]): Arguments => {
    const { values: v } = parseArgs({
        args,
        strict: true,
        allowPositionals: false,
        options: {
            dir: { type: 'string', short: 'd', multiple: true },
            tar: { type: 'string', short: 't' },
            gzip: { type: 'boolean', short: 'z', default: false },
            scan: { type: 'boolean', default: false },
            url: { type: 'string', short: 'u' },
            port: { type: 'string', short: 'p', default: '8080' },
            host: { type: 'string', short: 'H', default: '127.0.0.1' },
            mount: { type: 'string', short: 'm', default: '/files' },
            'index-file': { type: 'string', short: 'i', default: 'index.html' },
            quiet: { type: 'boolean', short: 'q', default: false },
            version: { type: 'boolean', short: 'v', default: false },
            help: { type: 'boolean', short: 'h', default: false }
        }
    });

    const dirs = v.dir ?? [];
    const backends = [dirs.length > 0, v.tar !== undefined, v.url !== undefined].filter(Boolean).length;
    if (backends > 1) {
        throw new Error('Choose only one of --dir, --tar and --url');
    }
    if ((v.gzip || v.scan) && v.tar === undefined) {
        throw new Error('--gzip and --scan require --tar');
    }

    let config: DataSourceConfig;
    if (v.tar !== undefined) {
        config = { type: 'tar', path: v.tar, compressed: v.gzip, indexed: !v.scan };
    } else if (v.url !== undefined) {
        config = { type: 'remote', baseUrl: v.url };
    } else if (dirs.length > 0) {
        config = { type: 'folders', paths: dirs };
    } else {
        config = { type: 'folders', paths: [], includeWorkingDir: true };
    }

    const port = parseInteger(v.port, 'port');
    if (port < 0 || port > 65535) {
        throw new Error(`Port out of range: ${port}`);
    }

    return {
        help: v.help,
        version: v.version,
        quiet: v.quiet,
        config,
        serve: {
            port,
            host: v.host,
            server: {
                mountPath: v.mount,
                indexFile: v['index-file']
            }
        }
    };
};

export { parseArguments, usage };
export type { Arguments, ServeOptions };
