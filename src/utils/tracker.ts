/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { writeFile } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  ConversionIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  if (error instanceof Error) {
    return {
      reason: "read-error",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: String(error),
  };
}

function mapFileError(
  error: unknown,
  context: "read" | "parse" | "write" = "parse",
): IssueInfo<FileIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") {
      return { reason: "read-error", details };
    }
    if (error.code === "EACCES" || error.code === "EPERM") {
      return {
        reason: context === "write" ? "write-error" : "read-error",
        details,
      };
    }
  }

  const reasons: Record<typeof context, FileIssueReason> = {
    read: "read-error",
    parse: "parse-error",
    write: "write-error",
  };
  return { reason: reasons[context], details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private definedSnippets = 0;
  private knownSnippets = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  setDefinedSnippets(count: number): void {
    this.definedSnippets = count;
  }

  setKnownSnippets(count: number): void {
    this.knownSnippets = count;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(
    path: string,
    error: unknown,
    type: "file" | "resource",
    context?: "read" | "parse" | "write",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error, context);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  /**
   * Track a recoverable conversion problem
   */
  trackWarning(path: string, message: string): void {
    this.issues.push({ type: "conversion", path, message });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  getFileIssues(): FileIssue[] {
    return this.issues.filter((i): i is FileIssue => i.type === "file");
  }

  getResourceIssues(): ResourceIssue[] {
    return this.issues.filter((i): i is ResourceIssue => i.type === "resource");
  }

  getConversionIssues(): ConversionIssue[] {
    return this.issues.filter(
      (i): i is ConversionIssue => i.type === "conversion",
    );
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      definedSnippets: this.definedSnippets,
      knownSnippets: this.knownSnippets,
      warnings: this.getConversionIssues().length,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalFiles: stats.totalFiles,
        successfulFiles: stats.successfulFiles,
        failedFiles: stats.failedFiles,
        definedSnippets: stats.definedSnippets,
        knownSnippets: stats.knownSnippets,
        warnings: stats.warnings,
        duration: stats.duration,
      },
      issues: this.groupIssues(),
    };

    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  /**
   * File and resource issues by reason, conversion warnings by file
   */
  private groupIssues(): {
    file: Record<string, FileIssue[]>;
    resource: Record<string, ResourceIssue[]>;
    conversion: Record<string, string[]>;
  } {
    const grouped: {
      file: Record<string, FileIssue[]>;
      resource: Record<string, ResourceIssue[]>;
      conversion: Record<string, string[]>;
    } = {
      file: {},
      resource: {},
      conversion: {},
    };

    for (const issue of this.issues) {
      switch (issue.type) {
        case "file": {
          if (!grouped.file[issue.reason]) {
            grouped.file[issue.reason] = [];
          }
          grouped.file[issue.reason].push(issue);
          break;
        }
        case "resource": {
          if (!grouped.resource[issue.reason]) {
            grouped.resource[issue.reason] = [];
          }
          grouped.resource[issue.reason].push(issue);
          break;
        }
        case "conversion": {
          if (!grouped.conversion[issue.path]) {
            grouped.conversion[issue.path] = [];
          }
          grouped.conversion[issue.path].push(issue.message);
          break;
        }
      }
    }

    return grouped;
  }
}
