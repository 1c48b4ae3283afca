import { ReadWriteLock } from '@common/lock-manager/read-write-lock';
import { createDeferred, flushAsync } from '../../helpers/deferred';

describe('ReadWriteLock', () => {
  let lock: ReadWriteLock;

  beforeEach(() => {
    lock = new ReadWriteLock();
  });

  it('공유 모드는 여러 호출자가 동시에 점유할 수 있다', async () => {
    const gate = createDeferred();
    const entered: string[] = [];

    const first = lock.runShared(async () => {
      entered.push('first');
      await gate.promise;
    });
    const second = lock.runShared(async () => {
      entered.push('second');
      await gate.promise;
    });
    await flushAsync();

    expect(entered).toEqual(['first', 'second']);
    expect(lock.isLocked()).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(lock.isLocked()).toBe(false);
  });

  it('배타 모드가 점유 중이면 공유 모드는 해제될 때까지 기다린다', async () => {
    const gate = createDeferred();
    const events: string[] = [];

    const writer = lock.runExclusive(async () => {
      events.push('write:start');
      await gate.promise;
      events.push('write:end');
    });
    const reader = lock.runShared(() => {
      events.push('read');
    });
    await flushAsync();

    expect(events).toEqual(['write:start']);

    gate.resolve();
    await Promise.all([writer, reader]);
    expect(events).toEqual(['write:start', 'write:end', 'read']);
  });

  it('대기 중인 배타 모드 뒤에 도착한 공유 모드는 배타 모드 이후에 실행된다', async () => {
    const gate = createDeferred();
    const events: string[] = [];

    const firstReader = lock.runShared(async () => {
      events.push('read1:start');
      await gate.promise;
      events.push('read1:end');
    });
    const writer = lock.runExclusive(() => {
      events.push('write');
    });
    const secondReader = lock.runShared(() => {
      events.push('read2');
    });
    await flushAsync();

    expect(events).toEqual(['read1:start']);

    gate.resolve();
    await Promise.all([firstReader, writer, secondReader]);
    expect(events).toEqual(['read1:start', 'read1:end', 'write', 'read2']);
  });

  it('콜백이 예외를 던져도 락을 해제한다', async () => {
    await expect(
      lock.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.isLocked()).toBe(false);
    await expect(lock.runShared(() => 'ok')).resolves.toBe('ok');
  });
});
