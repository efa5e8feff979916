import type { Run, RunProgress } from "./types.js"

export function summarizeProgress(run: Run): RunProgress {
  const progress: RunProgress = {
    runId: run.id,
    status: run.status,
    total: run.stepResults.length,
    completed: 0,
    failed: 0,
    skipped: 0,
    pending: 0,
    inProgress: 0,
    currentStep: run.currentStep,
  }
  for (const result of run.stepResults) {
    switch (result.status) {
      case "completed":
        progress.completed++
        break
      case "failed":
        progress.failed++
        break
      case "skipped":
        progress.skipped++
        break
      case "in_progress":
        progress.inProgress++
        break
      case "pending":
        progress.pending++
        break
    }
  }
  return progress
}

function duration(from: string, to: string): string {
  const seconds = Math.max(0, Math.round((Date.parse(to) - Date.parse(from)) / 1000))
  if (seconds < 60) return `${seconds}s`
  const minutes = Math.floor(seconds / 60)
  return `${minutes}m ${seconds % 60}s`
}

export function formatRunSummary(run: Run): string {
  const progress = summarizeProgress(run)
  const lines = [
    `Run: ${run.id}`,
    `Plan: ${run.planId}`,
    `Status: ${run.status}`,
    `Progress: ${progress.completed}/${progress.total} completed, ${progress.failed} failed, ${progress.skipped} skipped`,
  ]
  if (run.startedAt) {
    lines.push(`Started: ${run.startedAt}`)
    if (run.completedAt) lines.push(`Duration: ${duration(run.startedAt, run.completedAt)}`)
  }
  if (run.currentStep) lines.push(`Current step: ${run.currentStep}`)
  if (run.error) lines.push(`Error: ${run.error}`)
  return lines.join("\n")
}
