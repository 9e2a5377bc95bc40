/**
 * @sealkit/payload
 *
 * Unlocks the encrypted rule set embedded in a deployment. The key is derived
 * from the verified identity, used for a single decrypt, and zeroed.
 */

export type { RuleSet, RuleSetDocument, RuleSetView, Secret } from './types.js';

export { deriveKey, watermarkFor, KEY_LENGTH } from './keys.js';

export { sealRuleSet, decryptRuleSet, unlockRuleSet, NONCE_LENGTH, TAG_LENGTH } from './cipher.js';

export { decodeRuleSet, encodeRuleSet, wipeRuleSet } from './ruleset.js';

export { createRuleSetView, type RuleSetViewOptions } from './view.js';
