/**
 * Send command - Stream an Annex-B file to a receiver
 */

import { Command } from 'commander';
import { DEFAULT_CONFIG, EncodedUnit, SessionBinder, TcpTransport, createLogger } from 'framewire';
import { loadUnits, parseNumber, replay } from '../source.js';

interface SendOptions {
  fps: string;
  maxQueuedFrames: string;
  verbose: boolean;
}

export const sendCommand = new Command('send')
  .description('Connect to a receiver and stream an Annex-B H.264 file to it')
  .argument('<address>', 'Receiver address (host:port)')
  .argument('<file>', 'Annex-B .h264 file to send')
  .option('--fps <fps>', 'Frames per second (0 sends as fast as possible)', '30')
  .option('--max-queued-frames <count>', 'Frames buffered before new ones are dropped', String(DEFAULT_CONFIG.maxQueuedFrames))
  .option('-v, --verbose', 'Log every packetizer event', false)
  .action(async (address: string, file: string, options: SendOptions) => {
    const logger = createLogger('Sender', options.verbose ? 'debug' : 'info');

    let fps: number;
    let maxQueuedFrames: number;
    try {
      fps = parseNumber(options.fps, 'fps');
      maxQueuedFrames = parseNumber(options.maxQueuedFrames, 'max queued frames', 1);
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    }

    let units: EncodedUnit[];
    try {
      units = await loadUnits(file);
    } catch (err) {
      console.error('Failed to read input:', err instanceof Error ? err.message : err);
      process.exit(1);
    }
    console.log(`Loaded ${units.length} units from ${file}`);

    const transport = new TcpTransport({ logger: logger.child('TCP') });
    const binder = new SessionBinder(transport, { role: 'sender', maxQueuedFrames, logger });

    binder.on('fault', (peer, error) => {
      console.error(`Write to ${peer} failed: ${error.message}`);
    });

    try {
      console.log(`Connecting to ${address}...`);
      const peer = await transport.dial(address);
      console.log(`Connected to ${peer}`);
    } catch (err) {
      console.error('Failed to connect:', err instanceof Error ? err.message : err);
      process.exit(1);
    }

    const frames = await replay(units, fps, (unit) => {
      binder.onUnitProduced(unit);
    });

    const packetizer = binder.getBinding()?.packetizer;
    if (packetizer) {
      await packetizer.flush();
      const stats = packetizer.getStats();
      console.log(`Sent ${frames} frames: ${stats.packetsSent} packets, ${stats.bytesSent} bytes, ${stats.framesDropped} dropped`);
    } else {
      console.log('Connection lost before the stream finished');
    }

    await binder.close();
    await transport.close();
  });
