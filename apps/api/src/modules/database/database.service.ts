import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";

const IN_MEMORY = ":memory:";

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name);
  readonly db: Database.Database;

  constructor(private readonly configService: ConfigService) {
    const dbPath = this.configService.get<string>("SOS_CACHE_DB_PATH") ?? "data/sos-cache.db";

    if (dbPath !== IN_MEMORY) {
      const dataDir = path.dirname(path.resolve(dbPath));
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      this.db.pragma("journal_mode = WAL");
      this.db.pragma("busy_timeout = 5000");
    }
    this.initializeSchema();
    this.logger.log(`SQLite connected: ${dbPath}`);
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sos_contact_cache (
        country_key TEXT PRIMARY KEY,
        country TEXT NOT NULL,
        contacts_json TEXT NOT NULL,
        fetched_at TEXT NOT NULL,
        written_at TEXT NOT NULL,
        origin TEXT NOT NULL
      );
    `);
  }

  ping(): void {
    this.db.prepare("SELECT 1").get();
  }

  onModuleDestroy(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
