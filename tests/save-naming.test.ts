import { describe, test, expect } from 'vitest';
import { SaveNaming, sessionNameFromDate } from '../src/control/SaveNaming';

describe('SaveNaming', () => {
  test('should start at match 0, recording 0', () => {
    const naming = new SaveNaming('s');
    expect(naming.currentName()).toBe('s_match0recording0.cfg');
  });

  test('should bump the recording number only on commit', () => {
    const naming = new SaveNaming('s');
    expect(naming.currentName()).toBe('s_match0recording0.cfg');
    naming.commitSave();
    naming.commitSave();
    expect(naming.getRecordingNumber()).toBe(2);
    expect(naming.currentName()).toBe('s_match0recording2.cfg');
  });

  test('should move the match number independently', () => {
    const naming = new SaveNaming('s');
    naming.commitSave();
    expect(naming.nextMatch()).toBe(1);
    expect(naming.nextMatch()).toBe(2);
    expect(naming.currentName()).toBe('s_match2recording1.cfg');
  });

  test('should format a UTC date as the session name', () => {
    expect(sessionNameFromDate(new Date(Date.UTC(2026, 0, 5, 3, 4, 9)))).toBe('session_20260105_030409');
  });
});
