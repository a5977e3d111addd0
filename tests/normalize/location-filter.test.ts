import { describe, it, expect } from 'vitest';
import {
  isLocationMatch,
  isRemoteLocation,
  isUnparseableLocation,
  resolveAreas,
  stateCodeForName,
  stateNameForCode,
} from '@jobscout/agents';

const DC = ['Washington DC'];

describe('isLocationMatch', () => {
  describe('remote markers', () => {
    it.each(['Remote - US', 'REMOTE', 'Fully remote (US only)', 'Work from home', 'Telecommute', 'Anywhere'])(
      'includes %s regardless of targets',
      (location) => {
        expect(isLocationMatch(location, DC)).toEqual({ include: true, reason: 'remote' });
      },
    );
  });

  describe('target synonyms', () => {
    it('matches metro suburbs to the metro target', () => {
      expect(isLocationMatch('Arlington, VA', DC)).toEqual({
        include: true,
        reason: 'target-match',
        matchedTarget: 'Washington DC',
      });
    });

    it('treats DC, Washington DC and District of Columbia as one place', () => {
      expect(isLocationMatch('District of Columbia', ['DC']).include).toBe(true);
      expect(isLocationMatch('Washington, D.C.', ['DC']).include).toBe(true);
      expect(isLocationMatch('DC', ['District of Columbia']).include).toBe(true);
    });

    it('matches city nicknames', () => {
      expect(isLocationMatch('New York, NY', ['NYC']).reason).toBe('target-match');
      expect(isLocationMatch('Tysons Corner, VA', ['Northern Virginia']).reason).toBe('target-match');
    });

    it('matches state codes against state names', () => {
      expect(isLocationMatch('Richmond, VA', ['Virginia']).reason).toBe('target-match');
    });

    it('does not widen a metro target to its whole state', () => {
      expect(isLocationMatch('Richmond, VA', ['Northern Virginia'])).toEqual({ include: false, reason: 'no-match' });
    });

    it('excludes other places', () => {
      expect(isLocationMatch('Seattle, WA', DC)).toEqual({ include: false, reason: 'no-match' });
    });

    it('does not treat a remote-only target list as a place', () => {
      expect(isLocationMatch('Arlington, VA', ['Remote'])).toEqual({ include: false, reason: 'no-match' });
    });
  });

  describe('fail-open', () => {
    it.each(['', '   ', 'N/A', '???', '12345', 'Multiple Locations'])('includes %j', (location) => {
      expect(isLocationMatch(location, DC)).toEqual({ include: true, reason: 'unparseable' });
    });

    it.each(['asdf qwerty', 'xj#9 zzq', 'lorem ipsum', 'Denver'])(
      'includes %j, which names no known place',
      (location) => {
        expect(isLocationMatch(location, DC)).toEqual({ include: true, reason: 'unparseable' });
      },
    );

    it('still excludes a known place outside the targets', () => {
      expect(isLocationMatch('Denver, CO', DC)).toEqual({ include: false, reason: 'no-match' });
      expect(isLocationMatch('London, United Kingdom', DC)).toEqual({ include: false, reason: 'no-match' });
    });

    it('includes null locations', () => {
      expect(isLocationMatch(null, DC).include).toBe(true);
    });

    it('includes everything when no targets are configured', () => {
      expect(isLocationMatch('Austin, TX', [])).toEqual({ include: true, reason: 'no-targets' });
    });
  });
});

describe('location helpers', () => {
  it('resolves codes only as whole segments', () => {
    expect(resolveAreas('Arlington, VA 22201')).toEqual(new Set(['dc-metro', 'state-va']));
    expect(resolveAreas('Work in or near Austin')).toEqual(new Set(['austin']));
  });

  it('detects remote markers as whole words', () => {
    expect(isRemoteLocation('Hybrid / Remote')).toBe(true);
    expect(isRemoteLocation('Remoteville, OH')).toBe(false);
  });

  it('recognises placeholder text', () => {
    expect(isUnparseableLocation('TBD')).toBe(true);
    expect(isUnparseableLocation('Boston')).toBe(false);
    expect(isUnparseableLocation('Toronto, Canada')).toBe(false);
    expect(isUnparseableLocation('Springfield')).toBe(true);
  });

  it('maps state codes and names', () => {
    expect(stateNameForCode('va')).toBe('Virginia');
    expect(stateCodeForName(' texas ')).toBe('TX');
  });
});
