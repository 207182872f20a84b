/**
 * Structured logger
 */

import { logger, runWithContext, setContextWorkflowType } from '@docintake/shared';

describe('Logger', () => {
  afterEach(() => {
    process.env.LOG_LEVEL = 'silent';
    jest.restoreAllMocks();
  });

  it('falls back to the default level for an unrecognised LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'toString';
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.info('hello');

    expect(log).toHaveBeenCalledTimes(1);
  });

  it('drops lines below the configured level', () => {
    process.env.LOG_LEVEL = 'warn';
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    logger.info('hello');

    expect(log).not.toHaveBeenCalled();
  });

  it('stamps lines with the request context', () => {
    process.env.LOG_LEVEL = 'info';
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    runWithContext({ correlationId: 'corr-log-1' }, () => {
      setContextWorkflowType('document_workflow');
      logger.info('Workflow started', { filename: 'invoice.txt' });
    });

    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      level: 'INFO',
      correlationId: 'corr-log-1',
      workflowType: 'document_workflow',
      message: 'Workflow started',
      filename: 'invoice.txt',
    });
  });
});
