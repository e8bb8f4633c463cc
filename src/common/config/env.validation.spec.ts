import { validate } from './env.validation';

describe('validate (environment)', () => {
  it('applies defaults and converts the port', () => {
    const env = validate({ AUTH_TOKEN: 'test-secret', MY_NUMBER: '910000000000', PORT: '9000' });

    expect(env.AUTH_TOKEN).toBe('test-secret');
    expect(env.MY_NUMBER).toBe('910000000000');
    expect(env.PORT).toBe(9000);
    expect(env.HOST).toBe('0.0.0.0');
  });

  it('defaults the port to 8086', () => {
    expect(validate({ AUTH_TOKEN: 'test-secret', MY_NUMBER: '1' }).PORT).toBe(8086);
  });

  it('requires AUTH_TOKEN', () => {
    expect(() => validate({ MY_NUMBER: '1' })).toThrow('AUTH_TOKEN');
  });

  it('requires MY_NUMBER', () => {
    expect(() => validate({ AUTH_TOKEN: 'test-secret', MY_NUMBER: '' })).toThrow('MY_NUMBER');
  });

  it('rejects an out-of-range port', () => {
    expect(() => validate({ AUTH_TOKEN: 'test-secret', MY_NUMBER: '1', PORT: '70000' })).toThrow('PORT');
  });
});
