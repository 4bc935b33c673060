import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import { Keypad } from '../../src/input/keypad';
import { Mailbox, type AudioSignal } from '../../src/audio/mailbox';
import { Framebuffer } from '../../src/display/framebuffer';
import { DEFAULT_CONFIG } from '../../src/emulator/config';
import { BellAudio, TerminalDisplay, TerminalKeypad, runInTerminal, type KeyInput, type TextOutput } from '../../src/cli/terminal';
import { makeEmu } from '../helpers/program';

class Sink implements TextOutput {
  chunks: string[] = [];
  write(text: string): boolean {
    this.chunks.push(text);
    return true;
  }
}

// Stands in for a raw-mode TTY on stdin
class FakeTty extends EventEmitter implements KeyInput {
  readonly isTTY = true;
  rawModes: boolean[] = [];
  paused = true;
  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }
  resume(): this {
    this.paused = false;
    return this;
  }
  pause(): this {
    this.paused = true;
    return this;
  }
}

function quietLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('TerminalKeypad', () => {
  it('holds a key down until no repeat arrives for releaseMs', () => {
    vi.useFakeTimers();
    const kp = new Keypad();
    const input = new TerminalKeypad(kp, { releaseMs: 200 });
    input.handleData('w');
    expect(kp.isDown(0x5)).toBe(true);
    vi.advanceTimersByTime(150);
    input.handleData('w');
    vi.advanceTimersByTime(150);
    expect(kp.isDown(0x5)).toBe(true);
    vi.advanceTimersByTime(50);
    expect(kp.isDown(0x5)).toBe(false);
  });

  it('presses every mapped key in a chunk and skips the rest', () => {
    vi.useFakeTimers();
    const kp = new Keypad();
    const input = new TerminalKeypad(kp);
    input.handleData('1p4');
    expect(kp.snapshot().filter(Boolean)).toHaveLength(2);
    expect(kp.isDown(0x1)).toBe(true);
    expect(kp.isDown(0xc)).toBe(true);
    input.detach();
  });

  it('Ctrl-C and Escape request quit', () => {
    const onQuit = vi.fn();
    const input = new TerminalKeypad(new Keypad(), { onQuit });
    input.handleData('\u0003');
    input.handleData('\u001b');
    expect(onQuit).toHaveBeenCalledTimes(2);
  });

  it('attach switches the TTY to raw mode and detach restores it', () => {
    const tty = new FakeTty();
    const kp = new Keypad();
    const input = new TerminalKeypad(kp);
    input.attach(tty);
    expect(tty.paused).toBe(false);
    tty.emit('data', Buffer.from('x'));
    expect(kp.isDown(0x0)).toBe(true);
    input.detach();
    expect(tty.rawModes).toEqual([true, false]);
    expect(tty.paused).toBe(true);
    expect(tty.listenerCount('data')).toBe(0);
  });
});

describe('TerminalDisplay', () => {
  it('homes the cursor and draws two characters per cell', () => {
    const out = new Sink();
    const fb = new Framebuffer();
    fb.drawSprite(0, 0, [0x80]);
    new TerminalDisplay(out).draw(fb);
    expect(out.chunks).toHaveLength(1);
    const lines = out.chunks[0].split('\n');
    expect(lines).toHaveLength(33);
    expect(lines[0]).toBe('\u001b[H██' + '  '.repeat(63));
  });
});

describe('BellAudio', () => {
  it('rings once per pending signal', () => {
    const out = new Sink();
    const box = new Mailbox<AudioSignal>();
    const bell = new BellAudio(box, out);
    expect(bell.poll()).toBe(false);
    box.offer({ tick: 4 });
    expect(bell.poll()).toBe(true);
    expect(bell.poll()).toBe(false);
    expect(out.chunks).toEqual(['\u0007']);
  });
});

describe('runInTerminal', () => {
  it('draws frames until the quit key, then restores the terminal', async () => {
    vi.useFakeTimers();
    const tty = new FakeTty();
    const out = new Sink();
    // "0" glyph at (0,0), then spin
    const emu = makeEmu([0xa000, 0x6000, 0x6100, 0xd015, 0x1208]);
    const done = runInTerminal(emu, { config: { ...DEFAULT_CONFIG }, logger: quietLogger(), input: tty, output: out });

    vi.advanceTimersByTime(200);
    tty.emit('data', '\u0003');
    expect(await done).toBe(0);

    expect(out.chunks[0]).toBe('\u001b[?25l\u001b[2J');
    expect(out.chunks[out.chunks.length - 1]).toBe('\u001b[?25h\n');
    const lastFrame = out.chunks[out.chunks.length - 2].split('\n');
    expect(lastFrame[0]).toBe('\u001b[H' + '██'.repeat(4) + '  '.repeat(60));
    expect(lastFrame[1]).toBe('██    ██' + '  '.repeat(60));
    expect(tty.rawModes).toEqual([true, false]);
    expect(tty.listenerCount('data')).toBe(0);
  });

  it('rings the bell when the sound timer expires', async () => {
    vi.useFakeTimers();
    const tty = new FakeTty();
    const out = new Sink();
    const emu = makeEmu([0x6001, 0xf018, 0x1204]);
    const done = runInTerminal(emu, { config: { ...DEFAULT_CONFIG }, logger: quietLogger(), input: tty, output: out });

    vi.advanceTimersByTime(200);
    tty.emit('data', '\u001b');
    expect(await done).toBe(0);
    expect(out.chunks.filter((c) => c === '\u0007')).toHaveLength(1);
  });

  it('returns 1 and cleans up when a CPU error ends the run', async () => {
    vi.useFakeTimers();
    const tty = new FakeTty();
    const out = new Sink();
    const logger = quietLogger();
    const emu = makeEmu([0x5121, 0x1202]);
    const done = runInTerminal(emu, {
      config: { ...DEFAULT_CONFIG, onCpuError: 'throw' },
      logger,
      input: tty,
      output: out,
    });

    vi.advanceTimersByTime(100);
    expect(await done).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('[scheduler] Unknown opcode 0x5121 at 0x0200; halting');
    expect(tty.rawModes).toEqual([true, false]);
    expect(out.chunks[out.chunks.length - 1]).toBe('\u001b[?25h\n');
  });
});
