import { detectTextSessionId, extractFlowSessionId } from './session-id';

const SID = '1760571668-000000000001105328-SR-000-000000000000DEN130-44144A80';

describe('extractFlowSessionId', () => {
  it('finds the id inside the nested message', () => {
    const record = { message: JSON.stringify({ message: `call ${SID} started` }) };
    expect(extractFlowSessionId(record)).toBe(SID);
  });

  it('finds the id in a plain message', () => {
    expect(extractFlowSessionId({ message: `HTTP callout for ${SID} failed` })).toBe(SID);
  });

  it('reads SESSION_ID from an object message', () => {
    expect(extractFlowSessionId({ message: { SESSION_ID: 'S-42' } })).toBe('S-42');
  });

  it('falls back to record-level fields', () => {
    expect(extractFlowSessionId({ message: 'hello', sid: 'S-9' })).toBe('S-9');
  });

  it('reports unknown when nothing matches', () => {
    expect(extractFlowSessionId({ message: 'heartbeat ok' })).toBe('unknown');
  });
});

describe('detectTextSessionId', () => {
  it('reads the id two lines below a SESSION ID header', () => {
    const text = 'SESSION ID\n----------\n1760571668-42-SR-1-ABC\nrest';
    expect(detectTextSessionId(text)).toBe('1760571668-42-SR-1-ABC');
  });

  it('reads the id on the line after FLOW ID:', () => {
    expect(detectTextSessionId('FLOW ID:\n1760571668-7-SR-2-XYZ\n')).toBe(
      '1760571668-7-SR-2-XYZ',
    );
  });

  it('falls back to quoted identifiers', () => {
    expect(detectTextSessionId('payload {"sid": "S-77"} end')).toBe('S-77');
  });

  it('falls back to the bare pattern anywhere in the text', () => {
    expect(detectTextSessionId('abc 1760571668-42-SR-1-ABC def')).toBe(
      '1760571668-42-SR-1-ABC',
    );
  });

  it('returns undefined without any id', () => {
    expect(detectTextSessionId('nothing here')).toBeUndefined();
  });
});
