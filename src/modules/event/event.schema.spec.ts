import { model } from 'mongoose';
import { Event, EventSchema } from './event.schema';
import { buildEvent } from '../../../test/support/fixtures';

describe('EventSchema', () => {
  const EventModel = model(Event.name, EventSchema);

  const invalidPaths = (overrides: Partial<Event>): string[] => {
    const error = new EventModel(buildEvent(overrides)).validateSync();
    return error ? Object.keys(error.errors).sort() : [];
  };

  it('accepts a well-formed event', () => {
    expect(invalidPaths({})).toEqual([]);
  });

  it('keeps seats_available within seats_total', () => {
    expect(invalidPaths({ seats_total: 10, seats_available: 11 })).toEqual(['seats_available']);
    expect(invalidPaths({ seats_total: 10, seats_available: 10 })).toEqual([]);
    expect(invalidPaths({ seats_available: -1 })).toEqual(['seats_available']);
  });

  it('bounds the duration to 10..300 minutes', () => {
    expect(invalidPaths({ duration_minutes: 9 })).toEqual(['duration_minutes']);
    expect(invalidPaths({ duration_minutes: 301 })).toEqual(['duration_minutes']);
    expect(invalidPaths({ duration_minutes: 300 })).toEqual([]);
  });

  it('rejects fractional seat counts and negative prices', () => {
    expect(invalidPaths({ seats_total: 10.5, seats_available: 5 })).toEqual(['seats_total']);
    expect(invalidPaths({ price_eur: -1 })).toEqual(['price_eur']);
  });

  it('serializes the id as a string and drops the version key', () => {
    // given
    const document = new EventModel(buildEvent());

    // when
    const json = document.toJSON();

    // then
    expect(json).toHaveProperty('id', document._id.toHexString());
    expect(json).not.toHaveProperty('_id');
    expect(json).not.toHaveProperty('__v');
  });
});
