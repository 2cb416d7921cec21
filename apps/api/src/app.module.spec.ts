import { describe, expect, it } from 'vitest';
import { LexicalSimilarityOracle } from '@timekeeper/agent';
import { assistantOptionsFrom } from './app.module.js';
import { ConfigService } from './config/config.service.js';

describe('assistantOptionsFrom', () => {
  it('passes scheduling settings through', () => {
    const options = assistantOptionsFrom(
      new ConfigService({ TIMEZONE: 'Europe/Berlin', WORKING_HOURS_START: '8', WORKING_HOURS_END: '16' }),
    );

    expect(options.scheduling).toEqual({
      timeZone: 'Europe/Berlin',
      workingHours: { startHour: 8, endHour: 16 },
    });
  });

  it('uses the lexical oracle with its default threshold', () => {
    const { similarity } = assistantOptionsFrom(new ConfigService({}));

    expect(similarity).toBeInstanceOf(LexicalSimilarityOracle);
    expect(similarity?.threshold).toBe(0.5);
  });

  it('applies a configured threshold', () => {
    const { similarity } = assistantOptionsFrom(new ConfigService({ SIMILARITY_THRESHOLD: '0.8' }));

    expect(similarity?.threshold).toBe(0.8);
  });
});
