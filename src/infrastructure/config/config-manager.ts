import path from 'node:path';
import { z } from 'zod';

/**
 * Application configuration interface
 */
export interface AppConfig {
	dataSource: DataSourceConfig;
	retrieval: RetrievalConfig;
	report: ReportConfig;
	logging: LoggingConfig;
}

export interface DataSourceConfig {
	casesPath: string;
}

/**
 * Presentation policy applied on top of the full ranking
 */
export interface RetrievalConfig {
	resultLimit: number;
	excludeZeroScores: boolean;
	/** "caseBase" derives numeric bounds from the loaded movies */
	numericBounds: 'static' | 'caseBase';
}

export interface ReportConfig {
	outputDir: string;
	filePrefix: string;
}

export interface LoggingConfig {
	level: 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
}

/**
 * Default application configuration
 */
export const DEFAULT_APP_CONFIG: AppConfig = {
	dataSource: {
		casesPath: path.resolve(process.cwd(), 'data/movies.csv'),
	},
	retrieval: {
		resultLimit: 5,
		excludeZeroScores: true,
		numericBounds: 'static',
	},
	report: {
		outputDir: path.resolve(process.cwd(), 'reports'),
		filePrefix: 'movie_search_results',
	},
	logging: {
		level: 'INFO',
	},
};

const booleanFlag = z
	.enum(['true', 'false', '1', '0', 'yes', 'no'])
	.transform((value) => value === 'true' || value === '1' || value === 'yes');

const environmentSchema = z.object({
	MOVIE_CASES_PATH: z.string().min(1).optional(),
	RESULT_LIMIT: z.coerce.number().int().positive().optional(),
	EXCLUDE_ZERO_SCORES: booleanFlag.optional(),
	NUMERIC_BOUNDS: z.enum(['static', 'caseBase']).optional(),
	REPORT_DIR: z.string().min(1).optional(),
	REPORT_PREFIX: z.string().min(1).optional(),
	LOG_LEVEL: z
		.string()
		.transform((value) => value.trim().toUpperCase())
		.pipe(z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']))
		.optional(),
});

export type ConfigOverrides = {
	[K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

/**
 * Configuration manager for centralized configuration access
 */
export class ConfigManager {
	private config: AppConfig;

	constructor(customConfig?: ConfigOverrides) {
		this.config = this.mergeConfig(DEFAULT_APP_CONFIG, customConfig);
	}

	getConfig(): AppConfig {
		return { ...this.config };
	}

	getDataSourceConfig(): DataSourceConfig {
		return { ...this.config.dataSource };
	}

	getRetrievalConfig(): RetrievalConfig {
		return { ...this.config.retrieval };
	}

	getReportConfig(): ReportConfig {
		return { ...this.config.report };
	}

	getLoggingConfig(): LoggingConfig {
		return { ...this.config.logging };
	}

	/**
	 * Create configuration from environment variables.
	 * Throws when a variable is present but invalid.
	 */
	static fromEnvironment(env: Record<string, string | undefined> = process.env): ConfigManager {
		const parsed = environmentSchema.safeParse(env);
		if (!parsed.success) {
			const details = parsed.error.issues
				.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
				.join('; ');
			throw new Error(`Invalid environment configuration: ${details}`);
		}

		const values = parsed.data;
		return new ConfigManager({
			dataSource: values.MOVIE_CASES_PATH ? { casesPath: path.resolve(values.MOVIE_CASES_PATH) } : undefined,
			retrieval: {
				resultLimit: values.RESULT_LIMIT,
				excludeZeroScores: values.EXCLUDE_ZERO_SCORES,
				numericBounds: values.NUMERIC_BOUNDS,
			},
			report: {
				outputDir: values.REPORT_DIR ? path.resolve(values.REPORT_DIR) : undefined,
				filePrefix: values.REPORT_PREFIX,
			},
			logging: { level: values.LOG_LEVEL },
		});
	}

	/**
	 * Merge configuration sections; undefined override values keep the base value
	 */
	private mergeConfig(base: AppConfig, override?: ConfigOverrides): AppConfig {
		if (!override) return base;

		return {
			dataSource: { ...base.dataSource, ...definedOnly(override.dataSource) },
			retrieval: { ...base.retrieval, ...definedOnly(override.retrieval) },
			report: { ...base.report, ...definedOnly(override.report) },
			logging: { ...base.logging, ...definedOnly(override.logging) },
		};
	}
}

function definedOnly<T extends object>(section: Partial<T> | undefined): Partial<T> {
	if (!section) {
		return {};
	}
	const result: Partial<T> = {};
	for (const key of Object.keys(section) as (keyof T)[]) {
		if (section[key] !== undefined) {
			result[key] = section[key];
		}
	}
	return result;
}
