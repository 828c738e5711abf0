import { SignalValidationError } from '../src/domain/errors.js';
import { cleanAlertText, parseAlertText } from '../src/signals/alertParser.js';

const source = { channel: 'alerts' };

describe('parseAlertText', () => {
  it('extracts the fields of an option alert', () => {
    const text = 'AAPL - $250 CALLS EXPIRATION 10/10 $1.29 STOP LOSS AT $1.00 TARGET $2.00 QTY 2';

    expect(parseAlertText(text, source)).toEqual({
      instrument: 'option',
      symbol: 'AAPL',
      strike: '250',
      optionType: 'CALLS',
      expiration: '10/10',
      quantity: '2',
      entryPrice: '1.29',
      stopPrice: '1.00',
      targetPrice: '2.00',
      rawText: text,
      source
    });
  });

  it('reads a leading direction and lower-case option alerts', () => {
    const parsed = parseAlertText('sto spy - 500 puts exp 12/19/2025 3.10 stop 4.00', source);

    expect(parsed).toMatchObject({
      instrument: 'option',
      direction: 'sto',
      symbol: 'spy',
      strike: '500',
      optionType: 'puts',
      expiration: '12/19/2025',
      entryPrice: '3.10',
      stopPrice: '4.00'
    });
    expect(parsed.targetPrice).toBeUndefined();
  });

  it('extracts the fields of an equity alert', () => {
    const text = 'BUY TSLA @ 250.50 STOP 245 TARGET 262 QTY 10';

    expect(parseAlertText(text, source)).toEqual({
      instrument: 'equity',
      symbol: 'TSLA',
      direction: 'BUY',
      quantity: '10',
      entryPrice: '250.50',
      stopPrice: '245',
      targetPrice: '262',
      rawText: text,
      source
    });
  });

  it('strips markup before matching', () => {
    expect(cleanAlertText('<b>BUY</b>   TSLA\n@ 250')).toBe('BUY TSLA @ 250');
    expect(parseAlertText('<b>BUY</b> TSLA @ 250', source).entryPrice).toBe('250');
  });

  it('rejects chatter that is not an alert', () => {
    expect(() => parseAlertText('good morning traders', source)).toThrow(SignalValidationError);

    try {
      parseAlertText('good morning traders', source);
    } catch (error) {
      expect(error).toBeInstanceOf(SignalValidationError);
      if (error instanceof SignalValidationError) {
        expect(error.code).toBe('UNRECOGNIZED_FORMAT');
      }
    }
  });
});
