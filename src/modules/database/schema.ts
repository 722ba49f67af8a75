export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS locations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    flag TEXT,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS panels (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    base_url TEXT NOT NULL UNIQUE,
    panel_type TEXT NOT NULL DEFAULT 'XUI',
    location_id INTEGER NOT NULL REFERENCES locations(id) ON DELETE RESTRICT,
    username_enc TEXT NOT NULL,
    password_enc TEXT NOT NULL,
    priority INTEGER NOT NULL DEFAULT 0,
    is_premium INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    is_healthy INTEGER,
    last_checked INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_panels_location ON panels(location_id, is_active, is_healthy);

  CREATE TABLE IF NOT EXISTS panel_inbounds (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    panel_id INTEGER NOT NULL REFERENCES panels(id) ON DELETE CASCADE,
    remote_inbound_id INTEGER NOT NULL,
    tag TEXT,
    remark TEXT,
    protocol TEXT NOT NULL,
    port INTEGER NOT NULL,
    listen_ip TEXT,
    panel_enabled INTEGER NOT NULL DEFAULT 1,
    is_active INTEGER NOT NULL DEFAULT 1,
    settings TEXT NOT NULL DEFAULT '{}',
    stream_settings TEXT NOT NULL DEFAULT '{}',
    total_gb REAL NOT NULL DEFAULT 0,
    expiry_time INTEGER,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    UNIQUE (panel_id, remote_inbound_id)
  );

  CREATE TABLE IF NOT EXISTS client_accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    panel_id INTEGER NOT NULL,
    inbound_id INTEGER,
    remote_inbound_id INTEGER NOT NULL,
    protocol TEXT NOT NULL,
    identifier TEXT NOT NULL,
    email TEXT NOT NULL,
    subscription_url TEXT,
    status TEXT NOT NULL DEFAULT 'ACTIVE',
    external_ref TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_client_accounts_panel ON client_accounts(panel_id, status);

  CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT,
    updated_at INTEGER NOT NULL
  );
`;
