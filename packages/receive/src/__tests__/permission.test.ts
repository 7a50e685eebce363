import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { PermissionGate, createReadlinePrompter } from '../permission.js';
import { ResponderError } from '../errors.js';
import { createSilentLogger } from '../logger.js';
import { OutputCollector } from './helpers/fake-channels.js';

function scripted(answers: string[]): { prompt: (q: string) => Promise<string>; asked: string[] } {
  const asked: string[] = [];
  const remaining = [...answers];
  return {
    asked,
    prompt: async (question) => {
      asked.push(question);
      const answer = remaining.shift();
      if (answer === undefined) throw new Error('no scripted answer left');
      return answer;
    },
  };
}

describe('PermissionGate', () => {
  it('grants without prompting when auto-accept is on', async () => {
    const { prompt, asked } = scripted([]);
    const gate = new PermissionGate({
      autoAccept: true,
      prompt,
      stderr: new OutputCollector(),
      logger: createSilentLogger(),
    });

    await expect(gate.ask()).resolves.toBeUndefined();
    expect(asked).toEqual([]);
  });

  it.each(['y', 'yes', 'Y', 'YES please'])('grants on %j', async (answer) => {
    const { prompt, asked } = scripted([answer]);
    const gate = new PermissionGate({ autoAccept: false, prompt, stderr: new OutputCollector(), logger: createSilentLogger() });

    await gate.ask();
    expect(asked).toEqual(['ok? (y/n): ']);
  });

  it('refuses on no and writes to stderr', async () => {
    const { prompt } = scripted(['No']);
    const stderr = new OutputCollector();
    const gate = new PermissionGate({ autoAccept: false, prompt, stderr, logger: createSilentLogger() });

    const err = await gate.ask().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ResponderError);
    expect(err).toHaveProperty('response', 'transfer rejected');
    expect(stderr.text).toBe('transfer rejected\n');
  });

  it('asks again on anything else', async () => {
    const { prompt, asked } = scripted(['', 'maybe', 'n']);
    const gate = new PermissionGate({ autoAccept: false, prompt, stderr: new OutputCollector(), logger: createSilentLogger() });

    await expect(gate.ask()).rejects.toBeInstanceOf(ResponderError);
    expect(asked).toHaveLength(3);
  });
});

describe('createReadlinePrompter', () => {
  it('writes the question and resolves with the trimmed line', async () => {
    const input = new PassThrough();
    const output = new OutputCollector();
    const prompt = createReadlinePrompter(input, output);

    const answer = prompt('ok? (y/n): ');
    input.write('  yes  \n');

    await expect(answer).resolves.toBe('yes');
    expect(output.text).toBe('ok? (y/n): ');
  });

  it('reads successive answers from one piped chunk', async () => {
    const input = new PassThrough();
    input.end('maybe\ny\n');
    const output = new OutputCollector();
    const prompt = createReadlinePrompter(input, output);
    const gate = new PermissionGate({ autoAccept: false, prompt, stderr: new OutputCollector(), logger: createSilentLogger() });

    await expect(gate.ask()).resolves.toBeUndefined();
    expect(output.text).toBe('ok? (y/n): ok? (y/n): ');
    prompt.close();
  });

  it('rejects once piped answers run out', async () => {
    const input = new PassThrough();
    input.end('maybe\n');
    const prompt = createReadlinePrompter(input, new OutputCollector());
    const gate = new PermissionGate({ autoAccept: false, prompt, stderr: new OutputCollector(), logger: createSilentLogger() });

    await expect(gate.ask()).rejects.toThrow('input closed before an answer was given');
  });

  it('rejects when the input ends before an answer', async () => {
    const input = new PassThrough();
    const prompt = createReadlinePrompter(input, new OutputCollector());

    const answer = prompt('ok? (y/n): ');
    input.end();

    await expect(answer).rejects.toThrow('input closed before an answer was given');
  });
});
