import { GreetdClient, toAuthExchange } from '../client';
import { SessionStartError, SocketNotFoundError, TransportError } from '../errors';
import { DemoTransport, type Transport } from '../transport';
import type { GreetdRequest, GreetdResponse } from '../types';

class ScriptedTransport implements Transport {
  readonly requests: GreetdRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly responses: Array<GreetdResponse | Error>) {}

  async roundTrip(request: GreetdRequest): Promise<GreetdResponse> {
    this.requests.push(request);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setImmediate(resolve));
    this.inFlight--;
    const next = this.responses.shift();
    if (next === undefined) throw new TransportError('script exhausted');
    if (next instanceof Error) throw next;
    return next;
  }

  close(): void {}
}

describe('toAuthExchange', () => {
  it('maps auth messages by type', () => {
    expect(toAuthExchange({ type: 'auth_message', auth_message_type: 'visible', auth_message: 'OTP:' })).toEqual({
      kind: 'prompt-visible',
      prompt: 'OTP:',
    });
    expect(toAuthExchange({ type: 'auth_message', auth_message_type: 'info', auth_message: 'hi' })).toEqual({
      kind: 'info',
      text: 'hi',
    });
  });

  it('falls back to a generic text for an empty auth error', () => {
    expect(toAuthExchange({ type: 'error', error_type: 'auth_error', description: '' })).toEqual({
      kind: 'error',
      text: 'Authentication failed',
    });
  });
});

describe('GreetdClient', () => {
  it('sends the handshake requests in order', async () => {
    const transport = new ScriptedTransport([
      { type: 'auth_message', auth_message_type: 'secret', auth_message: 'Password:' },
      { type: 'success' },
      { type: 'success' },
    ]);
    const client = new GreetdClient(transport);

    expect(await client.createSession('alice')).toEqual({ kind: 'prompt-secret', prompt: 'Password:' });
    expect(await client.postAuthMessageResponse('demo')).toEqual({ kind: 'success' });
    await client.startSession(['sway'], ['XDG_SESSION_TYPE=wayland']);

    expect(transport.requests).toEqual([
      { type: 'create_session', username: 'alice' },
      { type: 'post_auth_message_response', response: 'demo' },
      { type: 'start_session', cmd: ['sway'], env: ['XDG_SESSION_TYPE=wayland'] },
    ]);
  });

  it('never has two requests in flight', async () => {
    const transport = new ScriptedTransport([{ type: 'success' }, { type: 'success' }, { type: 'success' }]);
    const client = new GreetdClient(transport);

    await Promise.all([client.createSession('a'), client.cancelSession(), client.createSession('b')]);

    expect(transport.maxInFlight).toBe(1);
    expect(transport.requests.map((r) => r.type)).toEqual(['create_session', 'cancel_session', 'create_session']);
  });

  it('keeps serving after a failed round trip', async () => {
    const transport = new ScriptedTransport([new TransportError('broken pipe'), { type: 'success' }]);
    const client = new GreetdClient(transport);

    await expect(client.createSession('alice')).rejects.toThrow('broken pipe');
    expect(await client.createSession('alice')).toEqual({ kind: 'success' });
  });

  it('throws SessionStartError when start_session fails', async () => {
    const transport = new ScriptedTransport([{ type: 'error', error_type: 'error', description: 'no such file' }]);
    const client = new GreetdClient(transport);

    await expect(client.startSession(['nope'], [])).rejects.toThrow(SessionStartError);
  });

  it('swallows cancel failures', async () => {
    const transport = new ScriptedTransport([new TransportError('gone')]);
    const client = new GreetdClient(transport);

    await expect(client.cancelSession()).resolves.toBeUndefined();
  });

  it('requires GREETD_SOCK unless in demo mode', () => {
    expect(() => GreetdClient.create({ env: {} })).toThrow(SocketNotFoundError);
    expect(() => GreetdClient.create({ env: {} })).toThrow('greetd socket not found (GREETD_SOCK not set)');
    expect(() => GreetdClient.create({ demo: true, env: {} })).not.toThrow();
  });
});

describe('DemoTransport', () => {
  const client = new GreetdClient(new DemoTransport());

  it('prompts for a password', async () => {
    expect(await client.createSession('anyone')).toEqual({ kind: 'prompt-secret', prompt: 'Password: ' });
  });

  it('accepts the demo password only', async () => {
    expect(await client.postAuthMessageResponse('demo')).toEqual({ kind: 'success' });
    expect(await client.postAuthMessageResponse('wrong')).toEqual({
      kind: 'error',
      text: "Invalid password (hint: use 'demo')",
    });
  });

  it('starts and cancels without error', async () => {
    await expect(client.startSession(['bash'], [])).resolves.toBeUndefined();
    await expect(client.cancelSession()).resolves.toBeUndefined();
  });
});
