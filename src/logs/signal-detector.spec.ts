import { detectError, detectWaitOn, findKey, SESSION_DATA_KEY } from './signal-detector';

describe('findKey', () => {
  it('prefers a shallow match over a deeper one found earlier in key order', () => {
    const payload = {
      nested: { wait_on: 'deep' },
      Wait_On_Event: 'shallow',
    };
    expect(findKey(payload, 'wait_on')).toBe('shallow');
  });

  it('descends into lists element by element', () => {
    expect(findKey([{ a: 1 }, { b: { StatusCode: 502 } }], 'statuscode')).toBe(502);
  });

  it('skips excluded keys entirely', () => {
    const payload = { SessionData: { wait_on: 'stale' }, other: { x: 1 } };
    expect(findKey(payload, 'wait_on', { excludeKeys: [SESSION_DATA_KEY] })).toBeUndefined();
    expect(findKey(payload, 'wait_on')).toBe('stale');
  });

  it('applies exclusions to mapping keys only', () => {
    const payload = { items: [{ wait_on: 'from-list' }] };
    expect(findKey(payload, 'wait_on', { excludeKeys: ['items'] })).toBeUndefined();
    expect(findKey(payload.items, 'wait_on', { excludeKeys: ['items'] })).toBe('from-list');
  });

  it('gives up below the depth limit', () => {
    const payload = { a: { b: { c: { wait_on: 'x' } } } };
    expect(findKey(payload, 'wait_on', { maxDepth: 3 })).toBeUndefined();
    expect(findKey(payload, 'wait_on', { maxDepth: 4 })).toBe('x');
  });

  it('stops searching a mapping whose matching key is null', () => {
    const payload = { first: { wait_on: null, child: { wait_on: 'hidden' } }, second: { wait_on: 'sibling' } };
    expect(findKey(payload, 'wait_on')).toBe('sibling');
  });
});

describe('detectWaitOn', () => {
  it('ignores a wait_on that exists only inside SessionData', () => {
    const content = { PluginId: 'WAIT_1', SessionData: { wait_on: 'STALE' } };
    expect(detectWaitOn({ content, metadata: {} })).toBeUndefined();
  });

  it('finds wait_on outside SessionData even when SessionData also has one', () => {
    const content = { SessionData: { wait_on: 'STALE' }, Result: { wait_on: 'CALLBACK_READY' } };
    expect(detectWaitOn({ content, metadata: {} })).toBe('CALLBACK_READY');
  });

  it('searches object-shaped JSON text structurally', () => {
    const content = JSON.stringify({ SessionData: { wait_on: 'STALE' }, step: { wait_on: 'SMS_REPLY' } });
    expect(detectWaitOn({ content, metadata: {} })).toBe('SMS_REPLY');
  });

  it('falls back to metadata', () => {
    expect(detectWaitOn({ content: 'plain', metadata: { flags: { wait_on: 'TIMER' } } })).toBe('TIMER');
  });

  it('never reports an empty wait_on', () => {
    expect(detectWaitOn({ content: { wait_on: '' }, metadata: {} })).toBeUndefined();
    expect(detectWaitOn({ content: 'wait_on: ""', metadata: {} })).toBeUndefined();
  });

  it('treats a zero or empty-collection wait_on as absent', () => {
    expect(detectWaitOn({ content: { wait_on: 0 }, metadata: {} })).toBeUndefined();
    expect(detectWaitOn({ content: { wait_on: [] }, metadata: {} })).toBeUndefined();
    expect(detectWaitOn({ content: { wait_on: 7 }, metadata: {} })).toBe('7');
  });

  it('reads the dotted-variable form from free text', () => {
    const content = 'vars: {"$EXTCALL_3.wait_on": "AGENT_DONE"}';
    expect(detectWaitOn({ content, metadata: {} })).toBe('AGENT_DONE');
  });

  it('reads the unquoted assignment form from free text', () => {
    expect(detectWaitOn({ content: 'blocked wait_on=PAYMENT, retry later', metadata: {} })).toBe(
      'PAYMENT',
    );
  });
});

describe('detectError', () => {
  it('flags structural status codes of 400 and above', () => {
    expect(detectError({ content: { response: { statusCode: 404 } }, metadata: {} })).toBe(404);
    expect(detectError({ content: { status_code: '500' }, metadata: {} })).toBe(500);
  });

  it('ignores success codes', () => {
    expect(detectError({ content: { statusCode: 200 }, metadata: {} })).toBeUndefined();
  });

  it('ignores status codes inside SessionData', () => {
    const content = { SessionData: { statusCode: 500 }, step: 'ok' };
    expect(detectError({ content, metadata: {} })).toBeUndefined();
  });

  it('falls back to textual status forms', () => {
    expect(detectError({ content: 'status code = 429', metadata: {} })).toBe(429);
    expect(detectError({ content: 'upstream failed, status: 503', metadata: {} })).toBe(503);
  });

  it('stops at the first textual form that matches', () => {
    expect(detectError({ content: '"statuscode": 200 then status: 500', metadata: {} })).toBeUndefined();
  });

  it('ignores non-integer structural codes without raising', () => {
    expect(detectError({ content: { statusCode: 'n/a' }, metadata: {} })).toBeUndefined();
  });
});
