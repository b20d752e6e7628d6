import * as path from 'node:path';
import { z } from 'zod';
import { CatalogError, describeError } from '../errors';
import ExampleCatalog, { OptimizationExample, OptimizationType, PerformanceMetrics } from '../interfaces/exampleCatalog';
import FileSystem from '../interfaces/fileSystem';
import Logger from '../interfaces/logger';
import PrefixLogger from './prefixLogger';

export const DEFAULT_CATALOG_PATH = path.join(__dirname, '..', '..', 'data', 'examples.json');

const exampleSchema = z.object({
    id: z.string().min(1),
    title: z.string().min(1),
    description: z.string(),
    type: z.enum(['memory', 'battery', 'both']),
    routeName: z.string().optional(),
});

const catalogSchema = z.array(exampleSchema).superRefine((examples, ctx) => {
    const seen = new Set<string>();
    examples.forEach((example, index) => {
        if (seen.has(example.id)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'id'], message: `Duplicate example id "${example.id}"` });
        }
        seen.add(example.id);
    });
});

/** In-memory catalog; metrics are kept for the lifetime of the instance */
export class JsonExampleCatalog implements ExampleCatalog {
    private metrics: PerformanceMetrics[] = [];

    constructor(private examples: OptimizationExample[]) {}

    getAllExamples(): OptimizationExample[] {
        return [...this.examples];
    }

    getExamplesByType(type: OptimizationType): OptimizationExample[] {
        return this.examples.filter(e => e.type === type);
    }

    getExampleById(id: string): OptimizationExample | undefined {
        return this.examples.find(e => e.id === id);
    }

    search(query: string): OptimizationExample[] {
        const needle = query.trim().toLowerCase();
        if (!needle) return this.getAllExamples();
        return this.examples.filter(e =>
            e.title.toLowerCase().includes(needle) || e.description.toLowerCase().includes(needle));
    }

    recordMetrics(metrics: PerformanceMetrics): void {
        this.metrics.push(metrics);
    }

    getMetrics(exampleId: string): PerformanceMetrics[] {
        return this.metrics.filter(m => m.exampleId === exampleId);
    }
}

/**
* Reads and validates the example catalog.
* @param fs Injected file system
* @param filePath JSON file holding an array of examples; defaults to data/examples.json
*/
export async function loadExampleCatalog(
    fs: FileSystem,
    logger: Logger,
    filePath: string = DEFAULT_CATALOG_PATH
): Promise<JsonExampleCatalog> {
    const xLogger = new PrefixLogger('ExampleCatalog', logger);

    let raw: unknown;
    try {
        raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
        xLogger.error(`Could not read catalog ${filePath}`, error);
        throw new CatalogError(`Could not read catalog: ${describeError(error)}`, { filePath, cause: error });
    }

    const parsed = catalogSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new CatalogError(`Invalid catalog: ${issues}`, { filePath, cause: parsed.error });
    }

    xLogger.info(`Loaded ${parsed.data.length} examples from ${path.basename(filePath)}`);
    return new JsonExampleCatalog(parsed.data);
}
