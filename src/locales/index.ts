/**
 * Spanwise - Built-in Locales
 *
 * Registers the shipped rule tables on a registry. Nothing here is loaded
 * unless a caller asks for it.
 */

import { createDefaultDimensionRegistry } from '../dimensions.js';
import { ANY_LOCALE, RuleRegistry } from '../registry.js';
import type { Logger } from '../types.js';
import { consoleLogger } from '../types.js';
import { commonRules } from './common.js';
import { americanEnglishRules, britishEnglishRules, englishRules } from './en/index.js';
import { norwegianRules } from './nb.js';
import { dutchRules } from './nl.js';
import { loadEnglishVocabulary, loadNumeralVocabulary } from './vocabulary.js';

export function registerBuiltinLocales(registry: RuleRegistry): RuleRegistry {
    return registry
        .register(ANY_LOCALE, commonRules())
        .register('en', englishRules(loadEnglishVocabulary()))
        .register('en_GB', britishEnglishRules())
        .register('en_US', americanEnglishRules())
        .register('nl', dutchRules(loadNumeralVocabulary('nl')))
        .register('nb', norwegianRules(loadNumeralVocabulary('nb')));
}

/** Built-in dimensions with every built-in locale registered */
export function createDefaultRuleRegistry(logger: Logger = consoleLogger): RuleRegistry {
    return registerBuiltinLocales(new RuleRegistry(createDefaultDimensionRegistry(), logger));
}
