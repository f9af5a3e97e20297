import { DatabaseConnection } from '../../types/database.js';

/**
 * Initial Schema
 *
 * Identity, catalog, lists and watch tracking.
 *
 * FOREIGN KEY CASCADE RULES:
 * - users → lists, watched_episodes, public_profiles, auth_tokens: ON DELETE CASCADE
 * - lists → list_items: ON DELETE CASCADE
 * - media → list_items, watched_episodes: ON DELETE CASCADE
 *
 * Uniqueness invariants live in the schema, not only in services:
 * - media (tmdb_id, media_type): TMDB numbers movies and shows separately;
 *   NULL tmdb_id (manual entries) never collides
 * - list_items (list_id, media_id)
 * - watched_episodes (user_id, tv_show_id, season_number, episode_number)
 */
export class InitialSchemaMigration {
  static version = '20261019_001';
  static migrationName = 'initial_schema';

  static async up(db: DatabaseConnection): Promise<void> {
    // ============================================================
    // IDENTITY
    // ============================================================

    await db.execute(`
      CREATE TABLE users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        username TEXT NOT NULL UNIQUE,
        email TEXT NOT NULL UNIQUE,
        nickname TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        is_2fa_enabled BOOLEAN NOT NULL DEFAULT 0,
        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.execute(`
      CREATE TABLE auth_tokens (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        token_hash TEXT NOT NULL UNIQUE,
        expires_at TIMESTAMP NOT NULL,
        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
      )
    `);

    await db.execute('CREATE INDEX idx_auth_tokens_user ON auth_tokens(user_id)');

    // ============================================================
    // CATALOG
    // ============================================================

    await db.execute(`
      CREATE TABLE media (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        -- NULL for manual entries; SQLite allows any number of NULLs under UNIQUE
        tmdb_id INTEGER UNIQUE,
        media_type TEXT NOT NULL CHECK(media_type IN ('MOVIE', 'TV_SHOW')),
        title TEXT NOT NULL,
        original_title TEXT NOT NULL DEFAULT '',
        overview TEXT NOT NULL DEFAULT '',
        poster_path TEXT NOT NULL DEFAULT '',
        backdrop_path TEXT NOT NULL DEFAULT '',
        release_date TEXT,
        popularity REAL NOT NULL DEFAULT 0,
        vote_average REAL NOT NULL DEFAULT 0,
        vote_count INTEGER NOT NULL DEFAULT 0,
        original_language TEXT NOT NULL DEFAULT '',

        -- Movie
        runtime INTEGER,
        budget INTEGER,
        revenue INTEGER,

        -- TV show
        number_of_seasons INTEGER,
        number_of_episodes INTEGER,
        episode_run_time INTEGER,
        status TEXT,
        first_air_date TEXT,
        last_air_date TEXT,

        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await db.execute('CREATE INDEX idx_media_type ON media(media_type)');
    await db.execute('CREATE INDEX idx_media_title ON media(title)');

    // ============================================================
    // LISTS
    // ============================================================

    await db.execute(`
      CREATE TABLE lists (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        name TEXT NOT NULL,
        is_public BOOLEAN NOT NULL DEFAULT 0,
        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
      )
    `);

    await db.execute('CREATE INDEX idx_lists_user ON lists(user_id, created_at)');

    await db.execute(`
      CREATE TABLE list_items (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        list_id INTEGER NOT NULL,
        media_id INTEGER NOT NULL,
        position INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL DEFAULT 'PLANNED' CHECK(status IN ('PLANNED', 'IN_PROGRESS', 'WATCHED')),
        added_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (list_id) REFERENCES lists(id) ON DELETE CASCADE,
        FOREIGN KEY (media_id) REFERENCES media(id) ON DELETE CASCADE,
        UNIQUE(list_id, media_id)
      )
    `);

    await db.execute('CREATE INDEX idx_list_items_position ON list_items(list_id, position)');
    await db.execute('CREATE INDEX idx_list_items_media ON list_items(media_id)');

    // ============================================================
    // WATCH TRACKING
    // ============================================================

    await db.execute(`
      CREATE TABLE watched_episodes (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        tv_show_id INTEGER NOT NULL,
        season_number INTEGER NOT NULL,
        episode_number INTEGER NOT NULL,
        watched_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE,
        FOREIGN KEY (tv_show_id) REFERENCES media(id) ON DELETE CASCADE,
        UNIQUE(user_id, tv_show_id, season_number, episode_number)
      )
    `);

    await db.execute(
      'CREATE INDEX idx_watched_episodes_recent ON watched_episodes(user_id, watched_at)'
    );

    // ============================================================
    // PUBLIC PROFILES
    // ============================================================

    await db.execute(`
      CREATE TABLE public_profiles (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL UNIQUE,
        bio TEXT NOT NULL DEFAULT '' CHECK(length(bio) <= 500),
        avatar_url TEXT NOT NULL DEFAULT '',
        is_visible BOOLEAN NOT NULL DEFAULT 1,
        show_watched_episodes BOOLEAN NOT NULL DEFAULT 1,
        show_lists BOOLEAN NOT NULL DEFAULT 1,
        created_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
      )
    `);
  }

  static async down(db: DatabaseConnection): Promise<void> {
    const tables = [
      'public_profiles',
      'watched_episodes',
      'list_items',
      'lists',
      'media',
      'auth_tokens',
      'users',
    ];

    for (const table of tables) {
      await db.execute(`DROP TABLE IF EXISTS ${table}`);
    }
  }
}
