import { parseCliArgs } from '../../../src/bin/cliArgs';

describe('parseCliArgs', () => {
  it('returns defaults for no arguments', () => {
    expect(parseCliArgs([])).toEqual({ help: false });
  });

  it('reads short and long flags', () => {
    expect(parseCliArgs(['-c', 'conf.yaml', '--env', 'production'])).toEqual({
      configPath: 'conf.yaml',
      environment: 'production',
      help: false
    });
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['--config'])).toThrow('--config needs a value');
    expect(() => parseCliArgs(['-e', '--help'])).toThrow('-e needs a value');
  });

  it('rejects unknown arguments', () => {
    expect(() => parseCliArgs(['--port', '80'])).toThrow('Unknown argument: --port');
  });
});
