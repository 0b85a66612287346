import { Logger } from '@nestjs/common';
import { unsealList } from '../partial-results';

describe('unsealList', () => {
  const logger = new Logger('PartialResultsTest');
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => warn.mockRestore());

  const toPartial = (value: number) => ({ value });

  it('should return success when nothing fails', () => {
    expect(unsealList([1, 2, 3], (value) => value * 10, toPartial, logger)).toEqual({
      status: 'success',
      items: [10, 20, 30],
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it('should return an empty success for an empty list', () => {
    expect(unsealList([], (value: number) => value, toPartial, logger)).toEqual({ status: 'success', items: [] });
  });

  it('should keep going after a failure and report it with its cause', () => {
    const failure = new Error('odd');

    const result = unsealList(
      [1, 2, 3, 4],
      (value) => {
        if (value % 2 === 1) {
          throw failure;
        }
        return value;
      },
      toPartial,
      logger,
    );

    expect(result).toEqual({
      status: 'partial',
      items: [2, 4],
      failed: [
        { partial: { value: 1 }, cause: failure },
        { partial: { value: 3 }, cause: failure },
      ],
    });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenCalledWith('Returning partial record: odd');
  });

  it('should wrap thrown non-errors', () => {
    const result = unsealList(
      [1],
      () => {
        throw 'plain string';
      },
      toPartial,
      logger,
    );

    expect(result.status === 'partial' && result.failed[0].cause.message).toBe('plain string');
  });
});
