import { ConfigLoader } from './config/ConfigLoader';
import { AnalysisOrchestrator, AnalyzeOptions } from './orchestrator/AnalysisOrchestrator';
import { AnalysisReport } from './models/AnalysisReport';
import logger from './utils/logger';
import { EnvLoader } from './utils/EnvLoader';

/**
 * Main entry point for programmatic usage: load .env files and
 * configuration the way the CLI does, then analyze `targetPath`
 */
export async function runDoclens(
    targetPath: string,
    configPath?: string,
    options: AnalyzeOptions = {}
): Promise<AnalysisReport> {
    try {
        new EnvLoader().load(targetPath);

        const config = await new ConfigLoader().load(configPath);
        const report = await new AnalysisOrchestrator(config).analyze(targetPath, options);

        logger.info(`Analysis of ${targetPath} finished: ${report.issues.length} issue(s)`);
        return report;
    } catch (error) {
        logger.error(`Analysis failed: ${error instanceof Error ? error.message : String(error)}`);
        throw error;
    }
}

// Export main components for library usage
export { ConfigLoader, resolveConfig, validateConfig } from './config/ConfigLoader';
export { AnalysisOrchestrator, analyze, compareIssues } from './orchestrator/AnalysisOrchestrator';
export type { AnalyzeOptions } from './orchestrator/AnalysisOrchestrator';
export { ReportGenerator, serializeReport } from './reporter/ReportGenerator';
export { AdapterRegistry } from './adapters/AdapterRegistry';
export type { LanguageAdapter } from './adapters/LanguageAdapter';
export { PythonAdapter } from './adapters/PythonAdapter';
export { JavaScriptAdapter } from './adapters/JavaScriptAdapter';
export { TypeScriptAdapter } from './adapters/TypeScriptAdapter';
export { JavaAdapter } from './adapters/JavaAdapter';
export { GoAdapter } from './adapters/GoAdapter';
export { CppAdapter } from './adapters/CppAdapter';
export { DocumentationChecker } from './analyzer/DocumentationChecker';
export { DocumentationEvaluator } from './analyzer/DocumentationEvaluator';
export { parseDocstring, detectStyle } from './analyzer/DocstringParser';
export { buildFingerprintSnapshot, loadFingerprints, saveFingerprints } from './store/FingerprintStore';
export * from './models/CodeElement';
export * from './models/AnalysisReport';
export * from './models/errors';
export * from './config/schema';
