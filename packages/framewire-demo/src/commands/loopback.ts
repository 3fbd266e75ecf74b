/**
 * Loopback command - Run sender and receiver in one process
 */

import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { EncodedUnit, MemoryTransport, SessionBinder, createLogger } from 'framewire';
import { AnnexBRecorder, RecordedSession } from '../recorder.js';
import { loadUnits, parseNumber, replay } from '../source.js';

interface LoopbackOptions {
  fps: string;
  chunkSize: string;
  out?: string;
  verbose: boolean;
}

export const loopbackCommand = new Command('loopback')
  .description('Stream an Annex-B file through an in-memory connection and report what arrives')
  .argument('<file>', 'Annex-B .h264 file to send')
  .option('--fps <fps>', 'Frames per second (0 sends as fast as possible)', '0')
  .option('--chunk-size <bytes>', 'Split deliveries into chunks of at most this size', '1024')
  .option('-o, --out <file>', 'Write the received stream to this Annex-B file')
  .option('-v, --verbose', 'Log every pipeline event', false)
  .action(async (file: string, options: LoopbackOptions) => {
    const level = options.verbose ? 'debug' : 'info';

    let fps: number;
    let chunkSize: number;
    let units: EncodedUnit[];
    try {
      fps = parseNumber(options.fps, 'fps');
      chunkSize = parseNumber(options.chunkSize, 'chunk size', 1);
      units = await loadUnits(file);
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    }

    const [local, remote] = MemoryTransport.pair(['sender', 'receiver'], { chunkSize });
    const recorder = new AnnexBRecorder();
    const sender = new SessionBinder(local, { role: 'sender', logger: createLogger('Sender', level) });
    const receiver = new SessionBinder<RecordedSession, EncodedUnit>(remote, {
      role: 'receiver',
      decoder: recorder,
      logger: createLogger('Receiver', level),
    });

    local.connect();
    const frames = await replay(units, fps, (unit) => {
      sender.onUnitProduced(unit);
    });

    await sender.getBinding()?.packetizer?.flush();
    await new Promise<void>((resolve) => {
      setImmediate(resolve);
    });
    const pipeline = receiver.getBinding()?.pipeline;
    await pipeline?.idle();

    const stats = pipeline?.getStats();
    console.log(`Sent ${frames} frames from ${units.length} units`);
    if (stats) {
      console.log(`Received ${stats.unitsReceived} units, decoded ${stats.framesDecoded} frames`);
      console.log(`Dropped before bootstrap: ${stats.framesDroppedBeforeBootstrap}, sessions: ${stats.sessionsCreated}`);
    }

    await sender.close();
    await receiver.close();
    await local.close();

    if (options.out) {
      await writeFile(options.out, recorder.toAnnexB());
      console.log(`Wrote ${recorder.unitCount} units to ${options.out}`);
    }
  });
