import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import WebSocket from 'ws';
import { MonitorServer, type MonitorTarget } from './server.js';
import { decodeStatus } from '../status/snapshot.js';
import { NoImageError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { modelDetection, statusJson } from '../__fixtures__/snapshots.js';
import type { Frame, MonitorMessage, StatusSnapshot } from '../types/index.js';

function snapshot(): StatusSnapshot {
  const result = decodeStatus(
    statusJson({ battery: 73, objects: [modelDetection(1, 0, 0, 10, 10), modelDetection(2, 0, 0, 20, 20)] }),
  );
  if (!result.ok) throw new Error(result.reason);
  return result.snapshot;
}

class StubTarget implements MonitorTarget {
  readonly host = 'robot.test';
  frame: Frame | null = null;
  listeners: Array<(snapshot: StatusSnapshot) => void> = [];

  getStatus(): StatusSnapshot {
    return snapshot();
  }

  async getCameraImage(): Promise<Frame> {
    if (!this.frame) throw new NoImageError('no image was received');
    return this.frame;
  }

  onStatus(listener: (snapshot: StatusSnapshot) => void): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }
}

function nextMessage(ws: WebSocket, type: MonitorMessage['type']): Promise<MonitorMessage> {
  return new Promise((resolve) => {
    const onMessage = (data: WebSocket.RawData): void => {
      const message: MonitorMessage = JSON.parse(data.toString());
      if (message.type !== type) return;
      ws.off('message', onMessage);
      resolve(message);
    };
    ws.on('message', onMessage);
  });
}

describe('MonitorServer', () => {
  let target: StubTarget;
  let monitor: MonitorServer;
  let base: string;
  let port: number;

  beforeEach(async () => {
    target = new StubTarget();
    monitor = new MonitorServer(target, { broadcastMs: 1000 });
    port = await monitor.start(0);
    base = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await monitor.stop();
  });

  it('reports health', async () => {
    const res = await fetch(`${base}/api/health`);
    expect(await res.json()).toEqual({ ok: true, host: 'robot.test', clients: 0 });
  });

  it('serves the current snapshot', async () => {
    const res = await fetch(`${base}/api/status`);
    const body = await res.json();
    expect(body.robot.battery).toBe(73);
  });

  it('ranks vision objects and honours the count', async () => {
    const res = await fetch(`${base}/api/vision?count=1`);
    const body = await res.json();
    expect(body.count).toBe(1);
    expect(body.objects).toHaveLength(1);
    expect(body.objects[0].area).toBe(400);
  });

  it('answers 503 while no camera frame is available', async () => {
    const res = await fetch(`${base}/api/camera`);
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ error: 'no image was received' });
  });

  it('serves the latest camera frame as JPEG', async () => {
    target.frame = Buffer.from([0xff, 0xd8, 0xff, 0xd9]);
    const res = await fetch(`${base}/api/camera`);
    expect(res.headers.get('content-type')).toBe('image/jpeg');
    expect([...new Uint8Array(await res.arrayBuffer())]).toEqual([0xff, 0xd8, 0xff, 0xd9]);
  });

  it('feeds status and log lines to dashboard clients', async () => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}`);
    const initial = nextMessage(ws, 'status');
    await new Promise((resolve) => ws.once('open', resolve));
    expect((await initial).payload).toMatchObject({ robot: { battery: 73 } });

    const log = nextMessage(ws, 'log');
    logger.info('Robot', 'hello dashboard');
    expect((await log).payload).toMatchObject({ level: 'INFO', category: 'Robot', message: 'hello dashboard' });

    const update = nextMessage(ws, 'status');
    target.listeners.forEach((listener) => listener(snapshot()));
    expect((await update).type).toBe('status');
    ws.close();
  });
});
