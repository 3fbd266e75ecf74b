/**
 * Receive command - Accept one sender and record its stream
 */

import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { EncodedUnit, SessionBinder, TcpTransport, createLogger } from 'framewire';
import { AnnexBRecorder, RecordedSession } from '../recorder.js';
import { parseNumber } from '../source.js';

interface ReceiveOptions {
  host: string;
  out?: string;
  verbose: boolean;
}

export const receiveCommand = new Command('receive')
  .description('Listen for a sender and record the units it streams')
  .argument('<port>', 'Port to listen on')
  .option('-h, --host <host>', 'Host to bind to', '127.0.0.1')
  .option('-o, --out <file>', 'Write the received stream to this Annex-B file')
  .option('-v, --verbose', 'Log every receive pipeline event', false)
  .action(async (port: string, options: ReceiveOptions) => {
    const logger = createLogger('Receiver', options.verbose ? 'debug' : 'info');

    let portNum: number;
    try {
      portNum = parseNumber(port, 'port', 1);
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    }

    const recorder = new AnnexBRecorder();
    const transport = new TcpTransport({ logger: logger.child('TCP') });
    const binder = new SessionBinder<RecordedSession, EncodedUnit>(transport, {
      role: 'receiver',
      decoder: recorder,
      logger,
    });

    let frames = 0;
    binder.on('frame', () => {
      frames++;
    });
    binder.on('bound', (peer) => {
      console.log(`Sender connected: ${peer}`);
    });
    binder.on('unbound', (peer) => {
      console.log(`Sender disconnected: ${peer} (${frames} frames so far)`);
    });
    binder.on('rejected', (peer) => {
      console.log(`Rejected ${peer}: a sender is already connected`);
    });
    binder.on('decodeError', (error) => {
      console.error(`Decode error: ${error.message}`);
    });

    try {
      const locator = await transport.listen(portNum, options.host);
      console.log(`Listening on ${locator.host}:${locator.port}`);
      console.log('Waiting for a sender... (Ctrl+C to stop)');
    } catch (err) {
      console.error('Failed to start listener:', err instanceof Error ? err.message : err);
      process.exit(1);
    }

    process.on('SIGINT', () => {
      console.log('\nShutting down...');
      shutdown().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('Shutdown failed:', err instanceof Error ? err.message : err);
          process.exit(1);
        }
      );
    });

    async function shutdown(): Promise<void> {
      await binder.close();
      await transport.close();
      console.log(`Received ${frames} frames across ${recorder.sessionsCreated} decoder sessions`);
      if (options.out) {
        await writeFile(options.out, recorder.toAnnexB());
        console.log(`Wrote ${recorder.unitCount} units to ${options.out}`);
      }
    }
  });
