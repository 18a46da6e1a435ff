import {
  ConfigurationError,
  NotFoundError,
  PayloadTooLargeError,
  StoreError,
  ValidationError,
  toErrorResponse
} from '../../../src/common/errors';

describe('toErrorResponse', () => {
  it('includes field details for validation errors', () => {
    const error = new ValidationError([{ field: 'port', message: 'must be an integer between 1 and 65535' }]);

    expect(toErrorResponse(error)).toEqual({
      statusCode: 400,
      body: {
        error: 'port: must be an integer between 1 and 65535',
        details: [{ field: 'port', message: 'must be an integer between 1 and 65535' }]
      }
    });
  });

  it('maps registry errors to their status', () => {
    expect(toErrorResponse(new NotFoundError('payments', 'p-1'))).toEqual({
      statusCode: 404,
      body: { error: 'Instance payments/p-1 is not registered' }
    });
    expect(toErrorResponse(new PayloadTooLargeError(10)).statusCode).toBe(413);
    expect(toErrorResponse(new StoreError('upsert', new Error('disk full')))).toEqual({
      statusCode: 500,
      body: { error: 'Store upsert failed: disk full' }
    });
  });

  it('hides the message of unexpected errors', () => {
    expect(toErrorResponse(new TypeError('secret detail'))).toEqual({
      statusCode: 500,
      body: { error: 'Internal server error' }
    });
    expect(toErrorResponse('thrown text').statusCode).toBe(500);
  });
});

describe('registry errors', () => {
  it('carry their class name, code and cause', () => {
    const cause = new Error('EACCES');
    const error = new StoreError('start', cause);

    expect(error.name).toBe('StoreError');
    expect(error.code).toBe('STORE_ERROR');
    expect(error.cause).toBe(cause);
    expect(new ConfigurationError('bad').code).toBe('CONFIGURATION_ERROR');
  });

  it('summarises an empty issue list', () => {
    expect(new ValidationError([]).message).toBe('Invalid request');
  });
});
