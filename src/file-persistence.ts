// Sales Call Scorecard - File Persistence
// Exports a session's outputs to disk for downstream sync, and stores
// narrated coaching audio.
//
// Export layout:
//   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
//     session.json
//     transcript.txt
//     responses.json
//     scoring.json      (when scored)
//     coaching.json     (when coaching exists)
//     report.md         (when a report exists)

import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { SessionResponse, SessionSnapshot } from "./types.js";

/** Timestamp prefix in UTC so exports sort the same on every host. */
export function buildDirectoryName(sessionId: string, createdAt: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const timestamp =
    `${createdAt.getUTCFullYear()}-${pad(createdAt.getUTCMonth() + 1)}-${pad(createdAt.getUTCDate())}_` +
    `${pad(createdAt.getUTCHours())}-${pad(createdAt.getUTCMinutes())}-${pad(createdAt.getUTCSeconds())}`;
  return `${timestamp}_${sessionId}`;
}

/** One row per item with the effective verdict alongside the AI judgment. */
export function formatResponses(responses: readonly SessionResponse[]): string {
  const rows = responses.map((r) => ({
    itemId: r.itemId,
    effectiveVerdict: r.override?.verdict ?? r.verdict,
    aiVerdict: r.verdict,
    confidence: r.confidence,
    evidence: r.evidence,
    rationale: r.rationale,
    override: r.override
      ? {
          verdict: r.override.verdict,
          actorId: r.override.actorId,
          reason: r.override.reason,
          overriddenAt: r.override.overriddenAt.toISOString(),
        }
      : null,
  }));
  return JSON.stringify(rows, null, 2);
}

export class FilePersistence {
  private baseDir: string;

  constructor(baseDir: string = "output") {
    this.baseDir = resolve(baseDir);
  }

  /**
   * Writes every artifact the session has. Returns the paths written, in
   * write order. Marking the session synced is the caller's job.
   */
  async saveSession(snapshot: SessionSnapshot): Promise<string[]> {
    const { session } = snapshot;
    const dirPath = join(this.baseDir, buildDirectoryName(session.id, session.createdAt));
    await mkdir(dirPath, { recursive: true });

    const files: Array<[string, string]> = [
      [
        "session.json",
        JSON.stringify(
          {
            id: session.id,
            ownerId: session.ownerId,
            deal: session.deal,
            status: session.status,
            createdAt: session.createdAt.toISOString(),
            submittedAt: session.submittedAt?.toISOString() ?? null,
            completedAt: session.completedAt?.toISOString() ?? null,
          },
          null,
          2,
        ),
      ],
      ["transcript.txt", snapshot.transcript?.text ?? ""],
      ["responses.json", formatResponses(snapshot.responses)],
    ];
    if (snapshot.scoring) files.push(["scoring.json", JSON.stringify(snapshot.scoring, null, 2)]);
    if (snapshot.coaching) files.push(["coaching.json", JSON.stringify(snapshot.coaching, null, 2)]);
    if (snapshot.report) files.push(["report.md", snapshot.report.content]);

    const savedPaths: string[] = [];
    for (const [name, content] of files) {
      const path = join(dirPath, name);
      await writeFile(path, content, "utf-8");
      savedPaths.push(path);
    }
    return savedPaths;
  }

  /** Stores narrated coaching audio; returns its locator. */
  async saveCoachingAudio(sessionId: string, audio: Buffer): Promise<string> {
    const dirPath = join(this.baseDir, "coaching-audio");
    await mkdir(dirPath, { recursive: true });
    const path = join(dirPath, `${sessionId}.mp3`);
    await writeFile(path, audio);
    return path;
  }
}
