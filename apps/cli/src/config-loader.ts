import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { CLIErrors } from "@casetable/constants";
import type { DialectOverrides } from "@casetable/parser";

/**
 * Settings a config file may carry.
 */
export interface FileConfig {
    maxFileSizeMb: number;
    dialect: DialectOverrides;
}

/**
 * Default built-in configuration.
 */
export const DEFAULT_CONFIG: FileConfig = {
    maxFileSizeMb: 10,
    dialect: {},
};

/**
 * Config file search locations.
 */
const CONFIG_FILENAMES = ["casetable.config.json", ".casetable.json"];

const FieldLabelsSchema = z
    .object({
        name: z.string().min(1),
        expression: z.string().min(1),
        expected: z.string().min(1),
        terminators: z.array(z.string().min(1)),
    })
    .partial()
    .strict();

const DialectSchema = z
    .object({
        functionPrefix: z.string().min(1),
        harnessParameterType: z.string().min(1),
        fields: FieldLabelsSchema,
        wrappers: z.array(z.string().min(1)),
        resultPackage: z.string().min(1),
        modelPackage: z.string().min(1),
        dateConstructor: z.string().min(1),
        longConstructor: z.string().min(1),
        floatConstructor: z.string().min(1),
        integerConstants: z.record(z.number().int()),
    })
    .partial()
    .strict();

const ConfigSchema = z
    .object({
        maxFileSizeMb: z.number().positive().optional(),
        dialect: DialectSchema.optional(),
    })
    .strict();

/**
 * Loads configuration from files.
 */
export class ConfigLoader {
    /**
     * Find config file using priority order:
     * 1. CASETABLE_CONFIG env var
     * 2. Search up from startDir to git root
     * 3. User config (~/.config/casetable/config.json)
     */
    static findConfigFile(startDir: string = process.cwd()): string | undefined {
        // Priority 1: CASETABLE_CONFIG env var
        const envConfig = process.env.CASETABLE_CONFIG;
        if (envConfig && existsSync(envConfig)) {
            return envConfig;
        }

        // Priority 2: Walk up from startDir to git root
        let currentDir = resolve(startDir);

        while (true) {
            for (const filename of CONFIG_FILENAMES) {
                const configPath = join(currentDir, filename);
                if (existsSync(configPath)) {
                    return configPath;
                }
            }

            if (existsSync(join(currentDir, ".git"))) {
                break;
            }

            const parentDir = dirname(currentDir);
            if (parentDir === currentDir) {
                break;
            }
            currentDir = parentDir;
        }

        // Priority 3: User config
        const homeDir = process.env.HOME;
        if (homeDir) {
            const userConfig = join(homeDir, ".config", "casetable", "config.json");
            if (existsSync(userConfig)) {
                return userConfig;
            }
        }

        return undefined;
    }

    /**
     * Load configuration from file.
     * @throws Error if config file is invalid JSON or has an invalid shape
     */
    static async load(path?: string): Promise<FileConfig> {
        if (!path) {
            return { ...DEFAULT_CONFIG };
        }

        const content = await readFile(path, "utf-8");
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            if (error instanceof SyntaxError) {
                throw new Error(CLIErrors.CONFIG_PARSE_ERROR(path));
            }
            throw error;
        }

        const result = ConfigSchema.safeParse(parsed);
        if (!result.success) {
            const detail = result.error.issues
                .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
                .join("; ");
            throw new Error(CLIErrors.INVALID_CONFIG(path, detail));
        }

        return {
            maxFileSizeMb: result.data.maxFileSizeMb ?? DEFAULT_CONFIG.maxFileSizeMb,
            dialect: result.data.dialect ?? {},
        };
    }
}
