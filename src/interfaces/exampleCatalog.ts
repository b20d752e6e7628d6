export type OptimizationType = 'memory' | 'battery' | 'both';

export interface OptimizationExample {
    id: string;
    title: string;
    description: string;
    type: OptimizationType;
    routeName?: string;
}

/** Figures recorded for one run of an example; illustrative, not profiled */
export interface PerformanceMetrics {
    exampleId: string;
    memoryUsageMb: number;
    rebuildCount: number;
    frameRenderTimeMs: number;
    isOptimized: boolean;
}

export default interface ExampleCatalog {
    getAllExamples(): OptimizationExample[];
    getExamplesByType(type: OptimizationType): OptimizationExample[];
    getExampleById(id: string): OptimizationExample | undefined;

    /**
    * Case-insensitive match on title and description.
    * A blank query returns every example.
    */
    search(query: string): OptimizationExample[];

    recordMetrics(metrics: PerformanceMetrics): void;
    getMetrics(exampleId: string): PerformanceMetrics[];
}
