/**
 * Keyword-based intent classification for storage-appliance domains.
 */

/**
 * Any strategy mapping free text to task-type labels.
 */
export interface IntentClassifier {
  classifyIntent(query: string): string[];
}

export type KeywordMappings = Record<string, readonly string[]>;

export const DEFAULT_INTENT_KEYWORDS: Readonly<KeywordMappings> = Object.freeze({
  'user-ops': ['user', 'account', 'permission', 'login', 'ssh'],
  'storage-ops': ['pool', 'zfs', 'dataset', 'volume', 'quota', 'replication', 'disk'],
  'sharing-ops': ['smb', 'cifs', 'nfs', 'share', 'iscsi', 'afp'],
  'snapshot-ops': ['snapshot', 'rollback', 'clone', 'replica'],
  'apps-ops': ['app', 'chart', 'helm', 'docker', 'compose'],
  'instance-ops': ['incus', 'vm', 'virtual', 'guest'],
  'vm-ops': ['bhyve', 'legacy vm', 'virt'],
  'debug-ops': ['debug', 'diagnostic', 'trace'],
  'meta-ops': ['tool', 'metadata', 'list tools'],
});

/**
 * Returns every task type with at least one keyword occurring as a literal
 * substring of the lower-cased query, in mapping order.
 */
export class KeywordIntentClassifier implements IntentClassifier {
  private readonly keywordMappings: KeywordMappings;

  constructor(keywordMappings?: KeywordMappings) {
    this.keywordMappings = keywordMappings && Object.keys(keywordMappings).length > 0
      ? keywordMappings
      : DEFAULT_INTENT_KEYWORDS;
  }

  classifyIntent(query: string): string[] {
    const lowered = query.toLowerCase();
    const matches: string[] = [];

    for (const [taskType, keywords] of Object.entries(this.keywordMappings)) {
      if (keywords.some(keyword => lowered.includes(keyword))) {
        matches.push(taskType);
      }
    }

    return matches;
  }

  getKeywordMappings(): KeywordMappings {
    return this.keywordMappings;
  }
}
