import { describe, it, expect } from 'vitest';
import { categorizeDocument } from '../../src/chunking/categorize.js';
import { getDefaultConfig } from '../../src/config.js';

const rules = getDefaultConfig().categories;

describe('categorizeDocument', () => {
  it('detects legislation', () => {
    expect(categorizeDocument('Закон про авторське право.md', rules)).toBe('legislation');
    expect(categorizeDocument('закон_про_ІВ.md', rules)).toBe('legislation');
  });

  it('detects research notes', () => {
    expect(categorizeDocument('Gem 1 Договори про ОІВ.md', rules)).toBe('research');
    expect(categorizeDocument('gem_15_аналіз.md', rules)).toBe('research');
  });

  it('detects articles', () => {
    expect(categorizeDocument('13 Expert article - NDA.md', rules)).toBe('article');
    expect(categorizeDocument('article_про_nca.md', rules)).toBe('article');
  });

  it('detects contracts', () => {
    expect(categorizeDocument('договір_NDA.md', rules)).toBe('contract');
    expect(categorizeDocument('NDA_template.md', rules)).toBe('contract');
  });

  it('applies rules in order', () => {
    expect(categorizeDocument('Аналіз_змін_документа.md', rules)).toBe('analysis');
    expect(categorizeDocument('Gem 7 Аналіз змін NDA.md', rules)).toBe('research');
  });

  it('falls back to other', () => {
    expect(categorizeDocument('random_file.md', rules)).toBe('other');
    expect(categorizeDocument('notes.md', rules)).toBe('other');
  });

  it('uses custom rules', () => {
    const custom = [{ docType: 'runbook', keywords: ['RUNBOOK', 'playbook'] }];
    expect(categorizeDocument('db-runbook.md', custom)).toBe('runbook');
    expect(categorizeDocument('Incident Playbook.md', custom)).toBe('runbook');
    expect(categorizeDocument('notes.md', custom)).toBe('other');
  });
});
