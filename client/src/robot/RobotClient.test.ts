import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RobotClient, type CommandChannel, type ImageChannel } from './RobotClient.js';
import { COLOR } from './color.js';
import { StatusWorker } from '../channels/StatusWorker.js';
import { NO_IMAGE } from '../channels/ImageWorker.js';
import type { CommandOutcome } from '../channels/CommandWorker.js';
import { SYS_FLAGS } from '../status/snapshot.js';
import {
  CommandRejectedError,
  ConnectionFailedError,
  InvalidImageFileError,
  InvalidSoundFileError,
} from '../errors.js';
import { FakeRobot } from '../__fixtures__/fakeRobot.js';
import { statusJson } from '../__fixtures__/snapshots.js';
import type { Command, Frame } from '../types/index.js';

const ACTIVE = SYS_FLAGS.PROGRAM_ACTIVE;

const pause = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

class StubCommands implements CommandChannel {
  readonly sent: Command[] = [];
  reply: (command: Command) => CommandOutcome = (command) => ({
    kind: 'accepted',
    commandId: command.cmd_id,
    status: 'complete',
  });

  async send(command: Command): Promise<CommandOutcome> {
    this.sent.push(command);
    return this.reply(command);
  }

  ids(): string[] {
    return this.sent.map((c) => c.cmd_id);
  }
}

class StubImage implements ImageChannel {
  streaming = false;
  stopStream = vi.fn(async () => {
    this.streaming = false;
  });

  isStreaming(): boolean {
    return this.streaming;
  }

  async startStream(): Promise<void> {
    this.streaming = true;
  }

  currentImage(): Frame {
    return NO_IMAGE;
  }
}

describe('RobotClient', () => {
  let status: StatusWorker;
  let command: StubCommands;
  let image: StubImage;
  let uploads: Buffer[];
  let robot: RobotClient;

  function createClient(strictCommands = false): RobotClient {
    return new RobotClient({
      status,
      image,
      command,
      audio: {
        sendAudio: async (payload) => {
          uploads.push(payload);
        },
      },
      host: 'robot.test',
      strictCommands,
      blockTimeoutMs: 300,
    });
  }

  beforeEach(() => {
    status = new StatusWorker({ host: 'robot.test', lossLimit: 5, maxPendingSnapshots: 20 });
    command = new StubCommands();
    image = new StubImage();
    uploads = [];
    robot = createClient();
    status.ingest(statusJson({ flags: ACTIVE }));
  });

  describe('robotSend', () => {
    it('asserts move and moving flags for accepted drive commands', async () => {
      expect(robot.isStopped()).toBe(true);
      await robot.moveAt(45);
      expect(robot.isMoveActive()).toBe(true);
      expect(robot.isTurnActive()).toBe(false);
      expect(robot.isStopped()).toBe(false);
      expect(robot.getStatus().robot.flags).toBe(ACTIVE | SYS_FLAGS.MOVE_ACTIVE | SYS_FLAGS.MOVING);
    });

    it('asserts the calibrating flag for imu_calibrate', async () => {
      await robot.inertial.calibrate();
      expect(robot.inertial.isCalibrating()).toBe(true);
    });

    it('logs rejected commands and leaves the flags alone', async () => {
      command.reply = (c) => ({ kind: 'rejected', commandId: c.cmd_id, reason: 'busy' });
      await expect(robot.moveAt(0)).resolves.toBeUndefined();
      expect(robot.isMoveActive()).toBe(false);
    });

    it('raises rejections in strict mode', async () => {
      robot = createClient(true);
      command.reply = (c) => ({ kind: 'rejected', commandId: c.cmd_id, reason: 'busy' });
      await expect(robot.kicker.kick('kick_hard')).rejects.toThrow(new CommandRejectedError('kick_hard', 'busy'));
    });

    it('ignores unknown commands', async () => {
      command.reply = (c) => ({ kind: 'unknown', commandId: c.cmd_id });
      await robot.turn('right');
      expect(robot.isTurnActive()).toBe(false);
    });
  });

  describe('motion', () => {
    it('flips a negative speed into a negative distance', async () => {
      await robot.moveFor(300, 0, { velocity: -50, wait: false });
      expect(command.sent).toEqual([
        { cmd_id: 'drive_for', distance: -300, angle: 0, final_heading: 0, drive_speed: 100, turn_speed: 75, stacking_type: 0 },
      ]);
    });

    it('turns left with a negative rate', async () => {
      await robot.turn('left', { velocity: 50 });
      expect(command.sent).toEqual([{ cmd_id: 'turn', turn_rate: -90, stacking_type: 0 }]);
    });

    it('turns to a heading relative to the heading reference', async () => {
      status.ingest(statusJson({ flags: ACTIVE, heading: 30 }));
      robot.inertial.resetHeading();
      await robot.turnTo(90, { wait: false });
      expect(command.sent).toEqual([{ cmd_id: 'turn_to', heading: 120, turn_rate: 75, stacking_type: 0 }]);
      await expect(robot.turnTo(360)).rejects.toThrow(RangeError);
    });

    it('waits for a move to finish', async () => {
      let finished = false;
      const move = robot.moveFor(100, 0).then(() => {
        finished = true;
      });
      await pause(10);
      status.ingest(statusJson({ flags: ACTIVE | SYS_FLAGS.MOVE_ACTIVE | SYS_FLAGS.MOVING }));
      await pause(120);
      expect(finished).toBe(false);

      status.ingest(statusJson({ flags: ACTIVE }));
      await move;
      expect(command.ids()).toEqual(['drive_for']);
    });

    it('stops all movement when a move never finishes', async () => {
      await robot.moveFor(100, 0);
      expect(command.ids()).toEqual(['drive_for', 'drive', 'turn']);
      expect(command.sent[1]).toEqual({ cmd_id: 'drive', angle: 0, speed: 0, stacking_type: 0 });
      expect(command.sent[2]).toEqual({ cmd_id: 'turn', turn_rate: 0, stacking_type: 0 });
      expect(robot.isMoveActive()).toBe(false);
      expect(robot.isStopped()).toBe(true);
    });

    it('rejects negative velocities', () => {
      expect(() => robot.setMoveVelocity(-1)).toThrow(RangeError);
      robot.setMoveVelocity(150, 'mmps');
      robot.setTurnVelocity(100);
      expect(robot.getMoveVelocity()).toBe(150);
      expect(robot.getTurnVelocity()).toBe(180);
    });

    it('reports positions in the heading reference frame', () => {
      status.ingest(statusJson({ flags: ACTIVE, robotX: 100, robotY: 0, heading: 90 }));
      robot.inertial.resetHeading();
      expect(robot.getXPosition()).toBeCloseTo(0, 6);
      expect(robot.getYPosition()).toBeCloseTo(100, 6);
    });

    it('waits two status updates after setting the position', async () => {
      const done = robot.setXYPosition(10, 20);
      await pause(10);
      status.ingest(statusJson({ flags: ACTIVE }));
      status.ingest(statusJson({ flags: ACTIVE }));
      await done;
      expect(command.sent).toEqual([{ cmd_id: 'set_pose', x: 10, y: 20 }]);
    });
  });

  describe('peripherals', () => {
    it('caps note duration and volume and marks the sound active', async () => {
      await robot.sound.playNote('F#6', 5000, 120);
      expect(command.sent).toEqual([{ cmd_id: 'play_note', note: 6, octave: 1, duration: 4000, volume: 100 }]);
      expect(robot.sound.isActive()).toBe(true);
    });

    it('plays built-in sounds by lowercase name', async () => {
      await robot.sound.play('TADA');
      expect(command.sent).toEqual([{ cmd_id: 'play_sound', name: 'tada', volume: 50 }]);
    });

    it('validates local sound files before uploading', async () => {
      await expect(robot.sound.playLocalFile('/nowhere/clip.ogg')).rejects.toBeInstanceOf(InvalidSoundFileError);
      expect(uploads).toEqual([]);
    });

    it('only shows bmp and png files', async () => {
      await expect(robot.screen.showFile('photo.jpg', 0, 0)).rejects.toBeInstanceOf(InvalidImageFileError);
      await robot.screen.showFile('LOGO.PNG', 10, 20);
      expect(command.sent).toEqual([{ cmd_id: 'lcd_draw_image_from_file', filename: 'LOGO.PNG', x: 10, y: 20 }]);
    });

    it('prints values separated by spaces', async () => {
      await robot.screen.print('battery', 87, true);
      expect(command.sent).toEqual([{ cmd_id: 'lcd_print', string: 'battery 87 true' }]);
    });

    it('sets LEDs by name or index', async () => {
      await robot.ledOn('light2', COLOR.RED);
      await robot.ledOn(9, true);
      await robot.ledOff(0);
      expect(command.sent).toEqual([
        { cmd_id: 'light_set', light2: { r: 255, g: 0, b: 0 } },
        { cmd_id: 'light_set', all: { r: 128, g: 128, b: 128 } },
        { cmd_id: 'light_set', light1: { r: 0, g: 0, b: 0 } },
      ]);
    });

    it('places cargo with a soft kick', async () => {
      await robot.kicker.place();
      expect(command.ids()).toEqual(['kick_soft']);
    });
  });

  describe('lifecycle', () => {
    it('stops the image stream and emits terminated on shutdown', async () => {
      image.streaming = true;
      const terminated = vi.fn();
      robot.on('terminated', terminated);

      await robot.shutdown();
      await robot.shutdown();

      expect(image.stopStream).toHaveBeenCalledTimes(1);
      expect(terminated).toHaveBeenCalledTimes(1);
      expect(terminated).toHaveBeenCalledWith('shutdown');
      expect(robot.signal.aborted).toBe(true);
    });

    it('terminates when the robot reports the power button', async () => {
      const terminated = new Promise((resolve) => robot.once('terminated', resolve));
      status.ingest(statusJson({ flags: ACTIVE | SYS_FLAGS.POWER_BUTTON }));
      await expect(terminated).resolves.toBe('power-button');
      expect(robot.isTerminated()).toBe(true);
    });
  });
});

describe('RobotClient.connect', () => {
  it('connects, announces the program and reads the first status', async () => {
    const fake = new FakeRobot({ status: () => statusJson({ battery: 64 }) });
    const host = await fake.start();
    try {
      const robot = await RobotClient.connect({ host, statusPollMs: 10 });
      expect(robot.getBatteryCapacity()).toBe(64);
      expect(fake.commands[0]).toEqual({ cmd_id: 'program_init' });
      await robot.shutdown();
    } finally {
      await fake.stop();
    }
  });

  it('fails with ConnectionFailedError when the robot is unreachable', async () => {
    await expect(RobotClient.connect({ host: '127.0.0.1:1', connectTimeoutMs: 500 })).rejects.toBeInstanceOf(
      ConnectionFailedError,
    );
  });
});
