/**
 * CPU-bound workload of the background-processing example: nested loops of
 * arithmetic, trigonometry and square roots, one result per iteration.
 *
 * Kept free of imports and captured variables so a TaskRunner can ship it to a
 * worker as source text.
 */
export const computeHeavyTask = (iterations: number): number[] => {
    const results: number[] = [];
    for (let i = 0; i < iterations; i++) {
        let result = 0;
        for (let j = 0; j < 1000; j++) {
            for (let k = 0; k < 100; k++) {
                result += i * j * k;
                result = result * 1.001;
                result = result / 1.0001;
                result += (i + j + k) * 0.5;
                if (k % 10 === 0) {
                    result += Math.sin(result * 0.1);
                    result += Math.cos(result * 0.1);
                }
                if (result > 0) {
                    result = Math.sqrt(result);
                    result = result * result;
                }
            }
        }
        results.push(result);
    }
    return results;
};
