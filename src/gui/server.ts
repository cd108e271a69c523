import 'dotenv/config';
import { build, context, type BuildOptions } from 'esbuild';
import path from 'path';

import { configFromEnv, resolveConfig } from '../core/config';
import { createApp, resolveAppPaths } from './app';
import { disposeWatchContexts } from './watch';

type BuildContext = Awaited<ReturnType<typeof context>>;
const activeWatchContexts: BuildContext[] = [];

async function bundleClient(projectRoot: string, watch: boolean): Promise<void> {
  const { assetsDir } = resolveAppPaths(projectRoot);
  const clientOptions: BuildOptions = {
    entryPoints: [path.resolve(projectRoot, 'src', 'gui', 'client.ts')],
    outfile: path.join(assetsDir, 'client.js'),
    bundle: true,
    sourcemap: true,
    platform: 'browser',
    target: ['es2018'],
    format: 'esm',
    logLevel: 'info',
    define: {
      'process.env.NODE_ENV': JSON.stringify(
        process.env.NODE_ENV ?? (watch ? 'development' : 'production'),
      ),
    },
  };

  if (watch) {
    const clientCtx = await context(clientOptions);
    await clientCtx.watch();
    activeWatchContexts.push(clientCtx);
  } else {
    await build(clientOptions);
  }
}

async function main(): Promise<void> {
  const projectRoot = path.resolve(__dirname, '..', '..');
  const port = Number(process.env.PORT ?? 5173);
  const watch = process.argv.includes('--watch');
  const config = resolveConfig(configFromEnv());

  await bundleClient(projectRoot, watch);
  const app = createApp(resolveAppPaths(projectRoot), config);
  const server = app.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(
      `Game server running at http://localhost:${port} (watch=${watch}, board=${config.width}x${config.height})`,
    );
  });

  process.once('SIGINT', () => {
    server.close();
    disposeWatchContexts(activeWatchContexts)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        // eslint-disable-next-line no-console
        console.error(error);
        process.exit(1);
      });
  });
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
