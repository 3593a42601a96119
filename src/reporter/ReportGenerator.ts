import { AnalysisReport, EvaluationScore, FileNote, Issue } from '../models/AnalysisReport';
import { ReportFormat } from '../config/schema';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';

function serializeScores(scores: EvaluationScore): Record<string, number | null> {
    return {
        clarity_score: scores.clarityScore,
        consistency_score: scores.consistencyScore,
        sync_score: scores.syncScore,
    };
}

function serializeIssue(issue: Issue): Record<string, unknown> {
    return {
        severity: issue.severity,
        category: issue.category,
        element_ref: {
            qualified_name: issue.element.qualifiedName,
            file: issue.element.location.filePath,
            start_line: issue.element.location.startLine,
            end_line: issue.element.location.endLine,
        },
        message: issue.message,
        ...(issue.suggestion === undefined ? {} : { suggestion: issue.suggestion }),
    };
}

function serializeNotes(notes: FileNote[]): Array<Record<string, string>> {
    return notes.map(note => ({ file: note.filePath, reason: note.reason }));
}

/**
 * Language-neutral record of a report with snake_case field names
 */
export function serializeReport(report: AnalysisReport): Record<string, unknown> {
    return {
        target_path: report.targetPath,
        state: report.state,
        complete: report.complete,
        files_analyzed: report.filesAnalyzed,
        elements_total: report.elementsTotal,
        elements_documented: report.elementsDocumented,
        coverage: report.coverage,
        scores: serializeScores(report.scores),
        issues_by_severity: report.issuesBySeverity,
        coverage_by_language: report.coverageByLanguage,
        issues: report.issues.map(serializeIssue),
        files: report.files.map(file => ({
            file: file.filePath,
            language: file.language,
            elements_total: file.elementsTotal,
            elements_documented: file.elementsDocumented,
            coverage: file.coverage,
            issue_count: file.issueCount,
            scores: serializeScores(file.scores),
        })),
        failed_files: serializeNotes(report.failedFiles),
        skipped_files: serializeNotes(report.skippedFiles),
        generated_at: report.generatedAt,
    };
}

function percent(value: number): string {
    return `${(value * 100).toFixed(1)}%`;
}

function score(value: number | null): string {
    return value === null ? 'n/a' : value.toFixed(2);
}

/**
 * Renders analysis reports as JSON, Markdown or plain text
 */
export class ReportGenerator {
    render(report: AnalysisReport, format: ReportFormat): string {
        switch (format) {
            case 'json':
                return JSON.stringify(serializeReport(report), null, 2) + '\n';
            case 'markdown':
                return this.buildMarkdown(report);
            case 'text':
                return this.buildText(report);
        }
    }

    /**
     * Write a rendered report to disk
     */
    async writeReport(report: AnalysisReport, format: ReportFormat, outputPath: string): Promise<string> {
        await writeFile(outputPath, this.render(report, format));
        logger.info(`${format.toUpperCase()} report generated: ${outputPath}`);
        return outputPath;
    }

    private buildText(report: AnalysisReport): string {
        const lines: string[] = [
            `Documentation report for ${report.targetPath}${report.complete ? '' : ' (cancelled, partial)'}`,
            `Files analyzed: ${report.filesAnalyzed}`,
            `Coverage: ${percent(report.coverage)} (${report.elementsDocumented}/${report.elementsTotal} elements documented)`,
            `Clarity: ${score(report.scores.clarityScore)}  Consistency: ${score(report.scores.consistencyScore)}  Sync: ${score(report.scores.syncScore)}`,
            `Issues: ${report.issues.length} (High ${report.issuesBySeverity.High}, Medium ${report.issuesBySeverity.Medium}, Low ${report.issuesBySeverity.Low})`,
        ];

        if (report.issues.length > 0) {
            lines.push('');
            for (const issue of report.issues) {
                const { filePath, startLine } = issue.element.location;
                lines.push(`${filePath}:${startLine} [${issue.severity}] ${issue.category} ${issue.element.qualifiedName}: ${issue.message}`);
            }
        }

        if (report.failedFiles.length > 0) {
            lines.push('', 'Failed files:');
            for (const note of report.failedFiles) {
                lines.push(`  ${note.filePath}: ${note.reason}`);
            }
        }

        if (report.skippedFiles.length > 0) {
            lines.push('', 'Skipped files:');
            for (const note of report.skippedFiles) {
                lines.push(`  ${note.filePath}: ${note.reason}`);
            }
        }

        return lines.join('\n') + '\n';
    }

    private buildMarkdown(report: AnalysisReport): string {
        const lines: string[] = [
            `# Documentation report`,
            '',
            `Target: \`${report.targetPath}\`${report.complete ? '' : ' (cancelled, partial results)'}`,
            '',
            '| Metric | Value |',
            '|---|---|',
            `| Files analyzed | ${report.filesAnalyzed} |`,
            `| Elements | ${report.elementsTotal} |`,
            `| Documented | ${report.elementsDocumented} |`,
            `| Coverage | ${percent(report.coverage)} |`,
            `| Clarity | ${score(report.scores.clarityScore)} |`,
            `| Consistency | ${score(report.scores.consistencyScore)} |`,
            `| Sync | ${score(report.scores.syncScore)} |`,
        ];

        if (report.files.length > 0) {
            lines.push('', '## Files', '', '| File | Language | Coverage | Issues |', '|---|---|---|---|');
            for (const file of report.files) {
                lines.push(`| \`${file.filePath}\` | ${file.language} | ${percent(file.coverage)} | ${file.issueCount} |`);
            }
        }

        if (report.issues.length > 0) {
            lines.push('', '## Issues', '', '| Location | Severity | Category | Element | Message |', '|---|---|---|---|---|');
            for (const issue of report.issues) {
                const { filePath, startLine } = issue.element.location;
                const message = issue.message.replace(/\|/g, '\\|');
                lines.push(`| \`${filePath}:${startLine}\` | ${issue.severity} | ${issue.category} | \`${issue.element.qualifiedName}\` | ${message} |`);
            }
        }

        if (report.failedFiles.length > 0) {
            lines.push('', '## Failed files', '');
            for (const note of report.failedFiles) {
                lines.push(`- \`${note.filePath}\`: ${note.reason}`);
            }
        }

        if (report.skippedFiles.length > 0) {
            lines.push('', '## Skipped files', '');
            for (const note of report.skippedFiles) {
                lines.push(`- \`${note.filePath}\`: ${note.reason}`);
            }
        }

        return lines.join('\n') + '\n';
    }
}
