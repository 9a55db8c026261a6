import { createDeadline, withRetry } from './resilience';

describe('withRetry', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const options = { maxRetries: 2, retryDelayMs: 1, label: 'test request' };

  test('should return the first successful result', async () => {
    const task = jest.fn().mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce('ok');

    await expect(withRetry(task, () => true, options)).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(2);
    expect(task).toHaveBeenNthCalledWith(2, 2);
  });

  test('should give up after maxRetries extra attempts', async () => {
    const task = jest.fn().mockRejectedValue(new Error('socket hang up'));

    await expect(withRetry(task, () => true, options)).rejects.toThrow('socket hang up');
    expect(task).toHaveBeenCalledTimes(3);
  });

  test('should not retry errors the predicate rejects', async () => {
    const task = jest.fn().mockRejectedValue(new Error('HTTP 400'));

    await expect(withRetry(task, () => false, options)).rejects.toThrow('HTTP 400');
    expect(task).toHaveBeenCalledTimes(1);
    expect(console.warn).not.toHaveBeenCalled();
  });
});

describe('createDeadline', () => {
  test('should abort and report a timeout once the time is up', async () => {
    const deadline = createDeadline(5);

    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(true);
    deadline.dispose();
  });

  test('should follow the parent signal without reporting a timeout', () => {
    const parent = new AbortController();
    const deadline = createDeadline(1000, parent.signal);

    parent.abort();

    expect(deadline.signal.aborted).toBe(true);
    expect(deadline.timedOut()).toBe(false);
    deadline.dispose();
  });

  test('should start aborted when the parent already is', () => {
    const parent = new AbortController();
    parent.abort();

    const deadline = createDeadline(1000, parent.signal);

    expect(deadline.signal.aborted).toBe(true);
    deadline.dispose();
  });
});
