import fs from "node:fs";
import path from "node:path";
import { create, extract } from "tar";
import { computeSha256 } from "./checksum.js";
import { timestampStamp } from "../core/run-id.js";
import type { Logger } from "../logging/logger.js";
import type { BackupArtifact, RollbackError } from "../types/deployment.js";

export type BackupManagerOptions = {
  projectName: string;
  backupDir: string;
  /** Data directory to archive and restore. */
  dataDir: string;
  /** How `dataDir` is shown in logs and sidecars. */
  dataDirLabel?: string;
  clock?: () => Date;
};

export type RestoreResult = { ok: true; artifact: BackupArtifact } | { ok: false; error: RollbackError };

/** An archive extracted beside the data directory, not yet swapped in. */
export type StagedRestore = { artifact: BackupArtifact; stagingDir: string };

export type StageResult = ({ ok: true } & StagedRestore) | { ok: false; error: RollbackError };

type Sidecar = {
  createdAt: string;
  sourceVolume: string;
  sha256: string;
};

function isSidecar(value: unknown): value is Sidecar {
  return (
    value !== null &&
    typeof value === "object" &&
    "createdAt" in value &&
    typeof value.createdAt === "string" &&
    "sourceVolume" in value &&
    typeof value.sourceVolume === "string" &&
    "sha256" in value &&
    typeof value.sha256 === "string"
  );
}

/** `20260211_093000` → ISO string in local time. */
function stampToIso(stamp: string): string {
  const m = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})$/.exec(stamp);
  if (!m) return new Date(0).toISOString();
  const [, y, mo, d, h, mi, s] = m.map(Number);
  return new Date(y, mo - 1, d, h, mi, s).toISOString();
}

function rollbackError(reason: RollbackError["reason"], message: string): { ok: false; error: RollbackError } {
  return { ok: false, error: { kind: "RollbackError", reason, message } };
}

/**
 * Backup Manager: timestamped tar.gz archives of the data directory, each
 * with a `.json` sidecar holding its checksum and source.
 */
export class BackupManager {
  private readonly archivePattern: RegExp;
  private readonly clock: () => Date;
  private readonly label: string;

  constructor(
    private readonly opts: BackupManagerOptions,
    private readonly logger: Logger,
  ) {
    const escaped = opts.projectName.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    this.archivePattern = new RegExp(`^${escaped}_backup_(\\d{8}_\\d{6})(?:_(\\d+))?\\.tar\\.gz$`);
    this.clock = opts.clock ?? (() => new Date());
    this.label = opts.dataDirLabel ?? opts.dataDir;
  }

  /**
   * Archive the data directory. Returns null, without touching the backup
   * directory, when there is nothing to back up.
   */
  async backup(sourceDir: string = this.opts.dataDir): Promise<BackupArtifact | null> {
    this.logger.info("Creating backup of existing data...");

    if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory() || fs.readdirSync(sourceDir).length === 0) {
      this.logger.info(`No existing data to back up in ${this.label}`);
      return null;
    }

    const now = this.clock();
    fs.mkdirSync(this.opts.backupDir, { recursive: true });
    const archivePath = this.freeArchivePath(timestampStamp(now));
    const name = path.basename(archivePath);

    await create({ gzip: true, file: archivePath, cwd: path.dirname(sourceDir), portable: true }, [path.basename(sourceDir)]);

    const sidecar: Sidecar = {
      createdAt: now.toISOString(),
      sourceVolume: this.label,
      sha256: await computeSha256(archivePath),
    };
    fs.writeFileSync(`${archivePath}.json`, JSON.stringify(sidecar, null, 2) + "\n", "utf8");
    const artifact: BackupArtifact = { path: archivePath, ...sidecar };

    this.logger.success(`Backup created: ${name}`);
    return artifact;
  }

  /** All archives in the backup directory, newest first. */
  list(): BackupArtifact[] {
    if (!fs.existsSync(this.opts.backupDir)) return [];

    const artifacts: Array<{ stamp: string; seq: number; artifact: BackupArtifact }> = [];
    for (const entry of fs.readdirSync(this.opts.backupDir, { withFileTypes: true })) {
      if (!entry.isFile()) continue;
      const m = this.archivePattern.exec(entry.name);
      if (!m) continue;
      artifacts.push({
        stamp: m[1],
        seq: m[2] ? Number(m[2]) : 1,
        artifact: this.describe(path.join(this.opts.backupDir, entry.name), m[1]),
      });
    }

    return artifacts
      .sort((a, b) => b.stamp.localeCompare(a.stamp) || b.seq - a.seq)
      .map((a) => a.artifact);
  }

  latest(): BackupArtifact | null {
    return this.list()[0] ?? null;
  }

  /** Describe an explicit archive path, or null when it does not exist. */
  fromPath(archivePath: string): BackupArtifact | null {
    if (!fs.existsSync(archivePath)) return null;
    const m = this.archivePattern.exec(path.basename(archivePath));
    return this.describe(archivePath, m ? m[1] : "");
  }

  /**
   * Verify an archive and extract it into a staging directory beside the data
   * directory. The data directory itself is not touched.
   */
  async stage(artifact: BackupArtifact | null): Promise<StageResult> {
    if (!artifact) return rollbackError("NoBackupFound", "No backup found for rollback");
    if (!fs.existsSync(artifact.path)) return rollbackError("NoBackupFound", `Backup archive not found: ${artifact.path}`);
    if (!fs.statSync(artifact.path).isFile()) {
      return rollbackError("UnreadableArchive", `Backup archive is not a file: ${artifact.path}`);
    }

    if (artifact.sha256) {
      const actual = await computeSha256(artifact.path);
      if (actual !== artifact.sha256) {
        return rollbackError(
          "ChecksumMismatch",
          `Checksum mismatch for ${path.basename(artifact.path)}: expected ${artifact.sha256}, got ${actual}`,
        );
      }
    }

    const parent = path.dirname(this.opts.dataDir);
    fs.mkdirSync(parent, { recursive: true });
    const stagingDir = fs.mkdtempSync(path.join(parent, `.${path.basename(this.opts.dataDir)}-restore-`));
    try {
      await extract({ file: artifact.path, cwd: stagingDir, strip: 1, strict: true });
    } catch (e: unknown) {
      fs.rmSync(stagingDir, { recursive: true, force: true });
      const reason = e instanceof Error ? e.message : String(e);
      return rollbackError("UnreadableArchive", `Backup archive could not be read: ${path.basename(artifact.path)} (${reason})`);
    }
    return { ok: true, artifact, stagingDir };
  }

  /** Swap a staged restore in place of the data directory. */
  commit(staged: StagedRestore): RestoreResult {
    this.logger.info(`Restoring ${path.basename(staged.artifact.path)} into ${this.label}...`);
    const parent = path.dirname(this.opts.dataDir);
    const previousRoot = fs.mkdtempSync(path.join(parent, `.${path.basename(this.opts.dataDir)}-previous-`));
    const previous = path.join(previousRoot, "data");

    const hadData = fs.existsSync(this.opts.dataDir);
    if (hadData) fs.renameSync(this.opts.dataDir, previous);
    try {
      fs.renameSync(staged.stagingDir, this.opts.dataDir);
    } catch (e: unknown) {
      if (hadData) fs.renameSync(previous, this.opts.dataDir);
      fs.rmSync(previousRoot, { recursive: true, force: true });
      this.discard(staged);
      throw e;
    }
    fs.rmSync(previousRoot, { recursive: true, force: true });

    this.logger.success(`Restored backup from ${staged.artifact.createdAt}`);
    return { ok: true, artifact: staged.artifact };
  }

  discard(staged: StagedRestore): void {
    fs.rmSync(staged.stagingDir, { recursive: true, force: true });
  }

  /**
   * Replace the data directory with the archive's contents. The data directory
   * is only swapped once the archive has been verified and fully extracted.
   */
  async restore(artifact: BackupArtifact | null): Promise<RestoreResult> {
    const staged = await this.stage(artifact);
    if (!staged.ok) return staged;
    return this.commit(staged);
  }

  /** Keep the newest `retain` archives (0 keeps all). Returns removed archive paths. */
  prune(retain: number): string[] {
    if (retain <= 0) return [];
    const stale = this.list().slice(retain);
    for (const artifact of stale) {
      fs.rmSync(artifact.path, { force: true });
      fs.rmSync(`${artifact.path}.json`, { force: true });
      this.logger.info(`Removed old backup: ${path.basename(artifact.path)}`);
    }
    return stale.map((a) => a.path);
  }

  /** `<project>_backup_<stamp>.tar.gz`, or `_2`, `_3`... when that name is taken. */
  private freeArchivePath(stamp: string): string {
    const base = `${this.opts.projectName}_backup_${stamp}`;
    let candidate = path.join(this.opts.backupDir, `${base}.tar.gz`);
    for (let n = 2; fs.existsSync(candidate); n++) {
      candidate = path.join(this.opts.backupDir, `${base}_${n}.tar.gz`);
    }
    return candidate;
  }

  private describe(archivePath: string, stamp: string): BackupArtifact {
    const sidecarPath = `${archivePath}.json`;
    if (fs.existsSync(sidecarPath)) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(sidecarPath, "utf8"));
        if (isSidecar(parsed)) {
          return { path: archivePath, createdAt: parsed.createdAt, sourceVolume: parsed.sourceVolume, sha256: parsed.sha256 };
        }
      } catch (e: unknown) {
        this.logger.warn(`Ignoring unreadable sidecar ${path.basename(sidecarPath)}: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
    return { path: archivePath, createdAt: stampToIso(stamp), sourceVolume: this.label };
  }
}
