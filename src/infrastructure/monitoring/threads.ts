/**
 * Live thread bookkeeping for thread metrics and thread dumps.
 *
 * JavaScript cannot enumerate worker threads it did not create, so the host
 * hands its workers to `track()`; a worker leaves the registry when it exits.
 */

import { EventEmitter } from 'events';
import { isMainThread, threadId as currentThreadId } from 'worker_threads';
import { StackTraceElement, ThreadDump, ThreadInfo, ThreadState } from '../../types';

export interface TrackableWorker extends EventEmitter {
  readonly threadId: number;
}

interface TrackedThread {
  name: string;
  state: ThreadState;
}

const STACK_FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

export function parseStackTrace(stack: string | undefined): StackTraceElement[] {
  if (!stack) {
    return [];
  }

  const frames: StackTraceElement[] = [];
  for (const line of stack.split('\n')) {
    const match = STACK_FRAME_PATTERN.exec(line);
    if (!match) {
      continue;
    }
    const [, qualifiedName = '<anonymous>', fileName, lineNumber] = match;
    const lastDot = qualifiedName.lastIndexOf('.');
    frames.push({
      className: lastDot === -1 ? '' : qualifiedName.slice(0, lastDot),
      methodName: lastDot === -1 ? qualifiedName : qualifiedName.slice(lastDot + 1),
      fileName,
      lineNumber: Number(lineNumber),
      nativeMethod: fileName === 'native'
    });
  }
  return frames;
}

function threadInfo(
  threadName: string,
  threadId: number,
  threadState: ThreadState,
  stackTrace: StackTraceElement[],
  daemon: boolean
): ThreadInfo {
  return {
    threadName,
    threadId,
    blockedTime: -1,
    blockedCount: -1,
    waitedTime: -1,
    waitedCount: -1,
    lockName: null,
    lockOwnerId: -1,
    lockOwnerName: null,
    daemon,
    inNative: false,
    suspended: false,
    threadState,
    priority: 5,
    stackTrace,
    lockedMonitors: [],
    lockedSynchronizers: [],
    lockInfo: null
  };
}

export class ThreadRegistry {
  private workers: Map<number, TrackedThread> = new Map();

  track(worker: TrackableWorker, name: string = `worker-${worker.threadId}`): void {
    const id = worker.threadId;
    // threadId is -1 once a worker has already exited
    if (id < 0 || this.workers.has(id)) {
      return;
    }

    this.workers.set(id, { name, state: 'NEW' });

    worker.once('online', () => {
      const tracked = this.workers.get(id);
      if (tracked) {
        tracked.state = 'RUNNABLE';
      }
    });
    worker.once('exit', () => {
      this.workers.delete(id);
    });
  }

  /**
   * The current thread plus every tracked worker that has not exited.
   */
  liveCount(): number {
    return 1 + this.workers.size;
  }

  getThreadDump(): ThreadDump {
    const current = threadInfo(
      isMainThread ? 'main' : `worker-${currentThreadId}`,
      currentThreadId,
      'RUNNABLE',
      parseStackTrace(new Error().stack),
      false
    );

    const workers = [...this.workers.entries()].map(([id, tracked]) =>
      threadInfo(tracked.name, id, tracked.state, [], true)
    );

    return { threads: [current, ...workers] };
  }
}
