/**
 * Sends this station's position every few seconds and logs what peers send.
 *
 *   COT_URL=tcp://takserver.example:8087 COT_HOST_ID=station-1 \
 *     npx tsx examples/send-position.ts
 */
import {
  CotRuntime,
  chainPassphraseProviders,
  configPassphraseProvider,
  createCotEvent,
  createLogger,
  delay,
  effectiveLogLevel,
  isCotWireError,
  loadConfigWithPreferences,
  promptPassphraseProvider,
  type RuntimeTask,
} from "../src";

async function main(): Promise<void> {
  const { config, destinations } = await loadConfigWithPreferences(process.env);
  const log = createLogger({ level: effectiveLogLevel(config) });

  const runtime = new CotRuntime({
    config,
    destinations,
    log,
    passphraseProvider: chainPassphraseProviders(
      configPassphraseProvider(config.PYTAK_TLS_CLIENT_PASSWORD),
      promptPassphraseProvider({ output: process.stderr }),
    ),
  });

  const reporter: RuntimeTask = {
    name: "position-reporter",
    run: async signal => {
      while (!signal.aborted) {
        await runtime.txQueue.put(
          createCotEvent({
            uid: config.COT_HOST_ID,
            hostId: config.COT_HOST_ID,
            callsign: config.COT_HOST_ID,
            lat: 37.7749,
            lon: -122.4194,
            stale: config.COT_STALE,
          }),
        );
        await delay(5_000, signal);
      }
    },
  };

  const printer: RuntimeTask = {
    name: "inbound-printer",
    run: async signal => {
      while (!signal.aborted) {
        const item = await runtime.rxQueue.get(1_000, signal);
        if (item === undefined) continue;
        if (Buffer.isBuffer(item)) {
          log.info({ bytes: item.length }, "Received undecoded frame");
        } else {
          log.info({ uid: item.uid, type: item.type }, "Received event");
        }
      }
    },
  };

  runtime.addTasks([reporter, printer]);
  process.once("SIGINT", () => runtime.stop());
  process.once("SIGTERM", () => runtime.stop());
  await runtime.run();
}

main().catch((err: unknown) => {
  const code = isCotWireError(err) ? err.code : "UNEXPECTED";
  process.stderr.write(`${code}: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
