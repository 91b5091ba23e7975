/**
 * ============================================================================
 * LIVE TIMER
 * ============================================================================
 *
 * Foreground countdown for `session start`.
 *
 * EVENT LOOP:
 * - setInterval (1 s) redraws the countdown and completes the session when
 *   the time is up
 * - keypresses: p pause, r resume, s stop, q detach (keep running in the
 *   background, controlled with `session pause|resume|stop|status`)
 * - Ctrl+C pauses a running session; a second Ctrl+C while paused detaches
 *
 * Everything runs on the one event loop, so a timer transition never
 * overlaps another.
 */

import { emitKeypressEvents } from 'readline';
import { isAppError } from '../errors.js';
import { formatClock, progressBar } from '../lib/format.js';
import type { FinishResult, SessionTimer, TimerHandle } from '../lib/timer.js';

export type LiveOutcome = { kind: 'finished'; result: FinishResult } | { kind: 'detached'; handle: TimerHandle };

export interface LiveTimerOptions {
  sound: boolean;
  showProgress: boolean;
  askRating: () => Promise<number>;
}

interface Keypress {
  name?: string;
  ctrl?: boolean;
}

export function runLiveTimer(timer: SessionTimer, options: LiveTimerOptions): Promise<LiveOutcome> {
  const input = process.stdin;
  const output = process.stdout;

  return new Promise<LiveOutcome>((resolve, reject) => {
    let settled = false;

    const render = () => {
      const snapshot = timer.tick();
      const label = snapshot.status === 'paused' ? '⏸️  Paused ' : '⏱️  ';
      const bar = options.showProgress ? ` ${progressBar(snapshot.progressPercent)}` : '';
      output.write(`\r${label}${formatClock(snapshot.remainingSeconds)} remaining${bar}   `);
    };

    const notice = (message: string) => {
      output.write(`\n${message}\n`);
      render();
    };

    const cleanup = () => {
      clearInterval(interval);
      input.off('keypress', onKey);
      process.off('SIGINT', onInterrupt);
      if (input.isTTY) input.setRawMode(false);
      input.pause();
      output.write('\n');
    };

    const settle = (work: () => Promise<LiveOutcome> | LiveOutcome) => {
      if (settled) return;
      settled = true;
      cleanup();
      Promise.resolve().then(work).then(resolve, reject);
    };

    const detach = () =>
      settle(() => {
        const handle = timer.toHandle();
        if (!handle) throw new Error('Timer has no active session to detach');
        return { kind: 'detached', handle };
      });

    const onInterrupt = () => {
      if (timer.state === 'paused') {
        detach();
        return;
      }
      timer.interrupt();
      notice('⏸️  Paused. r resume, s stop, q detach (Ctrl+C again detaches)');
    };

    const onKey = (_text: string | undefined, key: Keypress | undefined) => {
      if (!key) return;
      if (key.ctrl && key.name === 'c') {
        onInterrupt();
        return;
      }
      try {
        switch (key.name) {
          case 'p':
            timer.pause();
            notice('⏸️  Paused. Press r to resume');
            break;
          case 'r':
            timer.resume();
            notice('▶️  Resumed');
            break;
          case 's':
            // Freeze the clock while the rating is asked
            if (timer.state === 'running') timer.pause();
            settle(async () => ({ kind: 'finished', result: timer.stop(await options.askRating()) }));
            break;
          case 'q':
            detach();
            break;
        }
      } catch (error) {
        if (!isAppError(error)) {
          settle(() => {
            throw error;
          });
          return;
        }
        notice(`⚠️  ${error.message}`);
      }
    };

    const interval = setInterval(() => {
      render();
      if (timer.isExpired()) {
        settle(async () => {
          output.write(`${options.sound ? '\x07' : ''}🎉 Time's up!\n`);
          return { kind: 'finished', result: timer.complete(await options.askRating()) };
        });
      }
    }, 1000);

    emitKeypressEvents(input);
    if (input.isTTY) input.setRawMode(true);
    input.on('keypress', onKey);
    process.on('SIGINT', onInterrupt);
    input.resume();

    output.write('Controls: p pause · r resume · s stop · q run in background\n');
    render();
  });
}
