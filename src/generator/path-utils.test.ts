import { describe, it, expect } from '@jest/globals';
import {
  formatAsClassName,
  formatAsParameterName,
  isPathParameter,
  splitPath,
  stripBraces,
  unescapePointer,
} from './path-utils.js';

describe('path-utils', () => {
  it('should format class names', () => {
    expect(formatAsClassName('team_simple')).toBe('TeamSimple');
    expect(formatAsClassName('event-keys')).toBe('EventKeys');
    expect(formatAsClassName('Match.Video')).toBe('MatchVideo');
    expect(formatAsClassName('2fa')).toBe('_2fa');
    expect(formatAsClassName('--')).toBe('');
  });

  it('should format parameter names', () => {
    expect(formatAsParameterName('team_key')).toBe('teamKey');
    expect(formatAsParameterName('X-Api-Key')).toBe('xApiKey');
    expect(formatAsParameterName('If-None-Match')).toBe('ifNoneMatch');
  });

  it('should recognise path parameters', () => {
    expect(isPathParameter('{id}')).toBe(true);
    expect(isPathParameter('{}')).toBe(false);
    expect(isPathParameter('teams')).toBe(false);
    expect(stripBraces('{team_key}')).toBe('team_key');
    expect(stripBraces('teams')).toBe('teams');
  });

  it('should split paths into non-empty segments', () => {
    expect(splitPath('/teams/{id}/')).toEqual(['teams', '{id}']);
    expect(splitPath('/')).toEqual([]);
  });

  it('should decode JSON-pointer escapes', () => {
    expect(unescapePointer('a~1b~0c')).toBe('a/b~c');
  });
});
