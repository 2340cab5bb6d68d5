import { describe, it, expect } from 'vitest';
import {
  availableSlots,
  generateSlots,
  mergeSlotStreams,
  nextAvailableSlot,
  resolveCandidates,
} from '../../src/services/availability.service';
import { AssignmentStatus, ErrorCode, Service, TimeSlot } from '../../src/services/types';
import {
  alex,
  appointmentAt,
  assignmentOf,
  blair,
  cleaning,
  deepClean,
  errorOf,
  monday,
  parker,
  seededStore,
  testConfig,
  unwrap,
} from '../helpers/fixtures';

const MONDAY = new Date(2030, 0, 7);
const SUNDAY = new Date(2030, 0, 6);

function starts(slots: Iterable<TimeSlot>): Date[] {
  return [...slots].map((slot) => slot.startTime);
}

describe('resolveCandidates', () => {
  it('returns active, qualified employees sorted by id', async () => {
    const store = seededStore();

    expect((await resolveCandidates(store, cleaning)).map((e) => e.id)).toEqual([
      'emp-alex',
      'emp-blair',
      'emp-parker',
    ]);
    expect((await resolveCandidates(store, deepClean)).map((e) => e.id)).toEqual([
      'emp-alex',
      'emp-blair',
      'emp-parker',
      'emp-spec',
    ]);
  });

  it('restricts to the requested employees', async () => {
    const candidates = await resolveCandidates(seededStore(), cleaning, ['emp-blair', 'emp-retired']);
    expect(candidates.map((e) => e.id)).toEqual(['emp-blair']);
  });
});

describe('generateSlots', () => {
  it('starts on granularity boundaries and keeps the whole service inside', () => {
    const slots = [...generateSlots('e', [{ start: monday(9, 7), end: monday(10) }], 30, 15)];
    expect(slots.map((s) => s.startTime)).toEqual([monday(9, 15), monday(9, 30)]);
    expect(slots[1].endTime).toEqual(monday(10));
  });

  it('yields nothing when the service does not fit', () => {
    expect([...generateSlots('e', [{ start: monday(9), end: monday(9, 20) }], 30, 15)]).toEqual([]);
  });
});

describe('mergeSlotStreams', () => {
  it('orders by start time, then employee id', () => {
    const b = generateSlots('b', [{ start: monday(9), end: monday(10) }], 60, 60);
    const a = generateSlots('a', [{ start: monday(9), end: monday(11) }], 60, 60);
    const merged = [...mergeSlotStreams([b, a])].map((s) => `${s.employeeId}@${s.startTime.getHours()}`);
    expect(merged).toEqual(['a@9', 'b@9', 'a@10']);
  });
});

describe('availableSlots', () => {
  const config = testConfig();

  it('covers the whole working day for a free employee', async () => {
    const slots = [...unwrap(await availableSlots(seededStore(), [alex], cleaning, MONDAY, config))];

    expect(slots).toHaveLength(35);
    expect(slots[0]).toEqual({ employeeId: alex.id, startTime: monday(8), endTime: monday(8, 30), available: true });
    expect(slots[34].startTime).toEqual(monday(16, 30));
  });

  it('skips time taken by existing assignments', async () => {
    const store = seededStore([appointmentAt('apt-1', monday(10))], [assignmentOf('asg-1', 'apt-1', alex.id)]);
    const slots = starts(unwrap(await availableSlots(store, [alex], cleaning, MONDAY, config)));

    expect(slots).toHaveLength(32);
    expect(slots).toContainEqual(monday(9, 30));
    expect(slots).not.toContainEqual(monday(9, 45));
    expect(slots).not.toContainEqual(monday(10));
    expect(slots).toContainEqual(monday(10, 30));
  });

  it('widens busy time by the buffer', async () => {
    const store = seededStore([appointmentAt('apt-1', monday(10))], [assignmentOf('asg-1', 'apt-1', alex.id)]);
    const slots = starts(unwrap(await availableSlots(store, [alex], cleaning, MONDAY, testConfig({ bufferMinutes: 15 }))));

    expect(slots).toHaveLength(30);
    expect(slots).toContainEqual(monday(9, 15));
    expect(slots).not.toContainEqual(monday(9, 30));
    expect(slots).toContainEqual(monday(10, 45));
  });

  it('counts completed work as busy and cancelled work as free', async () => {
    const store = seededStore(
      [appointmentAt('apt-1', monday(10)), appointmentAt('apt-2', monday(11))],
      [
        assignmentOf('asg-1', 'apt-1', alex.id, AssignmentStatus.COMPLETED),
        assignmentOf('asg-2', 'apt-2', alex.id, AssignmentStatus.CANCELLED),
      ]
    );
    const slots = starts(unwrap(await availableSlots(store, [alex], cleaning, MONDAY, config)));

    expect(slots).not.toContainEqual(monday(10));
    expect(slots).toContainEqual(monday(11));
  });

  it('merges employees in start-time order', async () => {
    const slots = [...unwrap(await availableSlots(seededStore(), [alex, blair], cleaning, MONDAY, config))];

    expect(slots.slice(0, 3).map((s) => [s.employeeId, s.startTime])).toEqual([
      [alex.id, monday(8)],
      [blair.id, monday(8)],
      [alex.id, monday(8, 15)],
    ]);
  });

  it('respects personal working hours', async () => {
    const slots = starts(unwrap(await availableSlots(seededStore(), [parker], cleaning, MONDAY, config)));
    expect(slots[0]).toEqual(monday(12));
    expect(slots[slots.length - 1]).toEqual(monday(15, 30));
  });

  it('starts no earlier than now on the current day', async () => {
    const slots = starts(unwrap(await availableSlots(seededStore(), [alex], cleaning, SUNDAY, config)));
    expect(slots).toHaveLength(11);
    expect(slots[0]).toEqual(new Date(2030, 0, 6, 12));
    expect(slots[10]).toEqual(new Date(2030, 0, 6, 14, 30));
  });

  it('returns a sequence that can be iterated more than once', async () => {
    const slots = unwrap(await availableSlots(seededStore(), [alex], cleaning, MONDAY, config));
    expect([...slots]).toHaveLength(35);
    expect([...slots]).toHaveLength(35);
  });

  it('is empty on a day off', async () => {
    const tuesday = new Date(2030, 0, 8);
    expect([...unwrap(await availableSlots(seededStore(), [parker], cleaning, tuesday, config))]).toEqual([]);
  });

  it('rejects past dates', async () => {
    const error = errorOf(
      await availableSlots(seededStore(), [alex], cleaning, new Date(2030, 0, 5), config),
      ErrorCode.VALIDATION_ERROR
    );
    expect(error.message).toBe('Cannot look up availability for a past date');
  });

  it('rejects dates beyond the booking horizon', async () => {
    const error = errorOf(
      await availableSlots(seededStore(), [alex], cleaning, new Date(2030, 3, 7), config),
      ErrorCode.VALIDATION_ERROR
    );
    expect(error.message).toBe('Availability is only published 90 days ahead');
  });

  it('rejects a service without a positive duration', async () => {
    const broken: Service = { ...cleaning, durationMinutes: 0 };
    errorOf(await availableSlots(seededStore(), [alex], broken, MONDAY, config), ErrorCode.VALIDATION_ERROR);
  });

  it('rejects an invalid date', async () => {
    errorOf(await availableSlots(seededStore(), [alex], cleaning, new Date('nope'), config), ErrorCode.VALIDATION_ERROR);
  });
});

describe('nextAvailableSlot', () => {
  const config = testConfig();

  it('returns the first slot at or after the requested time', async () => {
    const slot = unwrap(await nextAvailableSlot(seededStore(), [alex], cleaning, monday(10, 7), 14, config));
    expect(slot?.startTime).toEqual(monday(10, 15));
  });

  it('never returns a slot before now', async () => {
    const slot = unwrap(await nextAvailableSlot(seededStore(), [alex], cleaning, new Date(2030, 0, 1), 14, config));
    expect(slot?.startTime).toEqual(new Date(2030, 0, 6, 12));
  });

  it('moves on to the next day when today is full', async () => {
    const from = new Date(2030, 0, 6, 14, 50);
    const slot = unwrap(await nextAvailableSlot(seededStore(), [alex], cleaning, from, 14, config));
    expect(slot?.startTime).toEqual(monday(8));
  });

  it('returns null when nothing is free in the search range', async () => {
    const from = new Date(2030, 0, 6, 14, 50);
    expect(unwrap(await nextAvailableSlot(seededStore(), [alex], cleaning, from, 0, config))).toBeNull();
  });
});
