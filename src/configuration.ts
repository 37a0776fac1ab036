import * as path from 'path';
import * as fs from 'fs';
import { CATEGORIES, type Category } from './dataStructures';
import { DEFAULT_KEYWORDS } from './patternLibrary';
import type { ScanMode } from './scanScheduler';

/**
 * Utility functions for handling extension configuration
 */

/**
 * Style of one highlight category
 */
export interface CategoryStyle {
    color: string;
    fontWeight?: string;
    fontStyle?: string;
}

/**
 * Configuration structure for the extension
 */
export interface ExtensionConfig {
    keywords: string[];
    supportedLanguages: string[];   // Scanned for pseudocode function comments
    pseudocodeLanguages: string[];  // Highlighted as pseudocode throughout
    rescanDelay: number;
    cacheSize: number;
    highlighting: Record<Category, CategoryStyle>;
    version: string;
}

const KEYWORD_STYLE: CategoryStyle = { color: '#569CD6', fontWeight: 'bold' };
const DEFINITION_STYLE: CategoryStyle = { color: '#DCDCAA' };
const VARIABLE_STYLE: CategoryStyle = { color: '#9CDCFE', fontStyle: 'italic' };

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ExtensionConfig = {
    keywords: [...DEFAULT_KEYWORDS],
    supportedLanguages: [
        'c',
        'cpp',
        'csharp',
        'java',
        'javascript',
        'typescript',
        'go',
        'rust',
        'php',
        'swift',
        'kotlin',
        'scala'
    ],
    pseudocodeLanguages: [
        'pseudocode'
    ],
    rescanDelay: 150,
    cacheSize: 256,
    highlighting: {
        'keyword': KEYWORD_STYLE,
        'function-name': DEFINITION_STYLE,
        'parameter': VARIABLE_STYLE,
        'variable': VARIABLE_STYLE
    },
    version: '1.0.0'
};

const CONFIG_DIRECTORY = 'pseudocode-highlighter';
const CONFIG_FILE = 'pseudocode-highlighter.json';

/**
 * Get the path to the configuration file
 */
export function getConfigFilePath(workspaceRoot: string): string {
    return path.join(workspaceRoot, '.vscode', CONFIG_DIRECTORY, CONFIG_FILE);
}

/**
 * The one config root of a window: its first workspace folder
 * Documents in other folders share it, so the cache below is never thrashed.
 */
export function configRootOf(folderPaths: readonly string[]): string | undefined {
    return folderPaths[0];
}

// Cached configuration to avoid repeated file reads
let cachedConfig: ExtensionConfig | null = null;
let cachedRoot: string | undefined;

/**
 * Load configuration from JSON file (with caching)
 * Without a workspace the defaults are used.
 */
export function loadConfig(workspaceRoot?: string): ExtensionConfig {
    if (cachedConfig && cachedRoot === workspaceRoot) {
        return cachedConfig;
    }

    cachedConfig = loadConfigFromFile(workspaceRoot);
    cachedRoot = workspaceRoot;
    return cachedConfig;
}

/**
 * Load configuration from JSON file without caching
 */
function loadConfigFromFile(workspaceRoot?: string): ExtensionConfig {
    if (!workspaceRoot) {
        return cloneConfig(DEFAULT_CONFIG);
    }

    const configPath = getConfigFilePath(workspaceRoot);
    if (!fs.existsSync(configPath)) {
        console.log('Configuration file not found, using defaults');
        return cloneConfig(DEFAULT_CONFIG);
    }

    try {
        const configData = fs.readFileSync(configPath, 'utf8');
        const config = normalizeConfig(JSON.parse(configData));

        console.log(`Loaded configuration from: ${configPath}`);
        return config;
    } catch (error) {
        console.error('Failed to load configuration, using defaults:', error);
        return cloneConfig(DEFAULT_CONFIG);
    }
}

/**
 * Refresh the cached configuration by reloading from file
 */
export function refreshConfigCache(workspaceRoot?: string): ExtensionConfig {
    console.log('Refreshing configuration cache');
    cachedConfig = loadConfigFromFile(workspaceRoot);
    cachedRoot = workspaceRoot;
    return cachedConfig;
}

/**
 * Merge user configuration over the defaults
 * Fields with the wrong shape keep their default value.
 */
export function normalizeConfig(raw: unknown): ExtensionConfig {
    const config = cloneConfig(DEFAULT_CONFIG);
    if (!isRecord(raw)) {
        console.warn('Configuration is not a JSON object, using defaults');
        return config;
    }

    if (isStringArray(raw.keywords) && raw.keywords.some(keyword => keyword.trim())) {
        config.keywords = raw.keywords;
    }
    if (isStringArray(raw.supportedLanguages)) {
        config.supportedLanguages = raw.supportedLanguages;
    }
    if (isStringArray(raw.pseudocodeLanguages)) {
        config.pseudocodeLanguages = raw.pseudocodeLanguages;
    }
    if (isNonNegativeNumber(raw.rescanDelay)) {
        config.rescanDelay = raw.rescanDelay;
    }
    if (isNonNegativeNumber(raw.cacheSize)) {
        config.cacheSize = Math.floor(raw.cacheSize);
    }
    if (typeof raw.version === 'string') {
        config.version = raw.version;
    }

    const highlighting = raw.highlighting;
    if (isRecord(highlighting)) {
        for (const category of CATEGORIES) {
            const style = highlighting[category];
            if (isRecord(style) && typeof style.color === 'string') {
                config.highlighting[category] = {
                    color: style.color,
                    fontWeight: typeof style.fontWeight === 'string' ? style.fontWeight : undefined,
                    fontStyle: typeof style.fontStyle === 'string' ? style.fontStyle : undefined
                };
            }
        }
    }

    return config;
}

/**
 * Decide how a document language is scanned, or undefined when it is not monitored
 */
export function modeForLanguage(config: ExtensionConfig, languageId: string): ScanMode | undefined {
    if (config.pseudocodeLanguages.includes(languageId)) {
        return 'whole-document';
    }
    if (config.supportedLanguages.includes(languageId)) {
        return 'comment-blocks';
    }
    return undefined;
}

/**
 * Save configuration to JSON file
 */
export function saveConfig(workspaceRoot: string, config: ExtensionConfig): boolean {
    const configPath = getConfigFilePath(workspaceRoot);

    try {
        // Ensure .vscode directory exists
        const configDir = path.dirname(configPath);
        if (!fs.existsSync(configDir)) {
            fs.mkdirSync(configDir, { recursive: true });
        }

        const configData = JSON.stringify(config, null, 2);
        fs.writeFileSync(configPath, configData);

        console.log(`Configuration saved to: ${configPath}`);
        return true;
    } catch (error) {
        console.error('Failed to save configuration:', error);
        return false;
    }
}

/**
 * Initialize configuration file with defaults if it doesn't exist
 */
export function initializeConfigFile(workspaceRoot: string): boolean {
    if (fs.existsSync(getConfigFilePath(workspaceRoot))) {
        console.log('Configuration file already exists');
        return true;
    }

    return saveConfig(workspaceRoot, DEFAULT_CONFIG);
}

function cloneConfig(config: ExtensionConfig): ExtensionConfig {
    return {
        ...config,
        keywords: [...config.keywords],
        supportedLanguages: [...config.supportedLanguages],
        pseudocodeLanguages: [...config.pseudocodeLanguages],
        highlighting: { ...config.highlighting }
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isNonNegativeNumber(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}
