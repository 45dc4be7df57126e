/**
 * Fatura CLI - Core Types
 */

export interface ProcessOptions {
    /** Continue past per-file failures without prompting. */
    yes: boolean;
    /** Print the result as JSON instead of a table. */
    json: boolean;
    /** Origin label stamped on every transaction; defaults to settings. */
    origin?: string;
    /** Force a grammar instead of detecting one. */
    source?: string;
    workspace?: string;
}

export interface CorrectOptions {
    workspace?: string;
}

export interface BanksOptions {
    workspace?: string;
}

export interface WorkspaceConfig {
    settingsPath: string;
    grammarsPath: string;
    learnedPatternsPath: string;
}

export interface Workspace {
    root: string;
    imports: string;
    config: WorkspaceConfig;
}
