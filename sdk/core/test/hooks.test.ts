import type { Event } from '@faultline/types';
import { ConfigurationError, SdkError } from '@faultline/utils';
import { describe, expect, it } from 'vitest';

import { callBeforeSendEvent, isHookMethodRef, resolveHook } from '../src/hooks';
import { makeEvent } from './helpers';

class Redactor {
  public calls = 0;

  public scrub(event: Event): Event {
    this.calls++;
    return { ...event, message: '[redacted]' };
  }

  public record(event: Event, result: unknown): void {
    this.calls++;
  }
}

describe('resolveHook', () => {
  it('returns nothing for a missing hook', () => {
    expect(resolveHook('beforeSendEvent', undefined, 1)).toBeUndefined();
    expect(resolveHook('beforeSendEvent', null, 1)).toBeUndefined();
  });

  it('wraps a function of the expected arity', () => {
    const invoke = resolveHook('beforeSendEvent', (event: Event) => event.event_id, 1);

    expect(invoke && invoke(makeEvent({ event_id: 'abc' }))).toBe('abc');
  });

  it('rejects a function of the wrong arity', () => {
    expect(() =>
      resolveHook('beforeSendEvent', (event: Event, extra: unknown) => event, 1),
    ).toThrow(
      new ConfigurationError(
        '`beforeSendEvent` must be a function that takes 1 argument or a [target, methodName] tuple',
      ),
    );
    expect(() => resolveHook('afterSendEvent', () => undefined, 2)).toThrow(
      '`afterSendEvent` must be a function that takes 2 arguments or a [target, methodName] tuple',
    );
  });

  it('rejects values that are neither functions nor method references', () => {
    expect(() => resolveHook('beforeSendEvent', 'scrub', 1)).toThrow(ConfigurationError);
    expect(() => resolveHook('beforeSendEvent', [new Redactor()], 1)).toThrow(
      ConfigurationError,
    );
  });

  it('calls a method reference with the target as this', () => {
    const redactor = new Redactor();
    const invoke = resolveHook('beforeSendEvent', [redactor, 'scrub'], 1);

    const result = invoke && invoke(makeEvent());

    expect(result).toEqual(makeEvent({ message: '[redacted]' }));
    expect(redactor.calls).toBe(1);
  });

  it('looks the method up again on every call', () => {
    const redactor = new Redactor();
    const invoke = resolveHook('afterSendEvent', [redactor, 'record'], 2);
    let replaced = 0;
    redactor.record = () => {
      replaced++;
    };

    invoke && invoke(makeEvent(), { status: 'excluded' });

    expect(replaced).toBe(1);
    expect(redactor.calls).toBe(0);
  });

  it('rejects a method reference to a missing method', () => {
    expect(() => resolveHook('beforeSendEvent', [new Redactor(), 'missing'], 1)).toThrow(
      '`beforeSendEvent` refers to `missing`, which is not a function on the given target',
    );
  });
});

describe('isHookMethodRef', () => {
  it('accepts object and method name pairs', () => {
    expect(isHookMethodRef([new Redactor(), 'scrub'])).toBe(true);
    expect(isHookMethodRef([Redactor, 'name'])).toBe(true);
    expect(isHookMethodRef([null, 'scrub'])).toBe(false);
    expect(isHookMethodRef([new Redactor(), 'scrub', 'extra'])).toBe(false);
  });
});

describe('callBeforeSendEvent', () => {
  it('passes the event through without a hook', () => {
    const event = makeEvent();

    expect(callBeforeSendEvent(undefined, event)).toBe(event);
  });

  it('drops the event when the hook returns a falsy value', () => {
    expect(callBeforeSendEvent(() => false, makeEvent())).toBeNull();
    expect(callBeforeSendEvent(() => null, makeEvent())).toBeNull();
    expect(callBeforeSendEvent(() => undefined, makeEvent())).toBeNull();
  });

  it('continues with the event the hook returns', () => {
    const replacement = makeEvent({ message: 'replaced' });

    expect(callBeforeSendEvent(() => replacement, makeEvent())).toBe(replacement);
  });

  it('throws when the hook returns something else', () => {
    expect(() => callBeforeSendEvent(() => 'keep', makeEvent())).toThrow(SdkError);
  });
});
