// Fact tables (source of truth for queue, timer and handoff state)
export const FACTS_SCHEMA_V1 = `
CREATE TABLE IF NOT EXISTS tasks (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    description      TEXT NOT NULL,
    project          TEXT,
    tags             TEXT NOT NULL DEFAULT '[]' CHECK (json_valid(tags)),
    lifecycle        TEXT NOT NULL DEFAULT 'open' CHECK (lifecycle IN ('open','closed','cancelled')),
    queue_position   INTEGER CHECK (queue_position IS NULL OR queue_position >= 0),
    due_ts           INTEGER,
    scheduled_ts     INTEGER,
    wait_ts          INTEGER,
    alloc_secs       INTEGER CHECK (alloc_secs IS NULL OR alloc_secs >= 0),
    created_ts       INTEGER NOT NULL,
    modified_ts      INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS sessions (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id          INTEGER NOT NULL REFERENCES tasks(id),
    start_ts         INTEGER NOT NULL,
    end_ts           INTEGER,
    origin           TEXT NOT NULL DEFAULT 'timer' CHECK (origin IN ('timer','interval')),
    created_ts       INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS externals (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id          INTEGER NOT NULL REFERENCES tasks(id),
    recipient        TEXT NOT NULL,
    note             TEXT,
    sent_ts          INTEGER NOT NULL,
    status           TEXT NOT NULL DEFAULT 'waiting' CHECK (status IN ('waiting','collected')),
    collected_ts     INTEGER
);

CREATE TABLE IF NOT EXISTS annotations (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id          INTEGER NOT NULL REFERENCES tasks(id),
    session_id       INTEGER REFERENCES sessions(id) ON DELETE SET NULL,
    note             TEXT NOT NULL,
    entry_ts         INTEGER NOT NULL
);

-- Dense queue ordinals: no two tasks share a position
CREATE UNIQUE INDEX IF NOT EXISTS ux_tasks_queue_position
    ON tasks(queue_position) WHERE queue_position IS NOT NULL;

-- Global timer exclusivity: every open session indexes to the same key
CREATE UNIQUE INDEX IF NOT EXISTS ux_sessions_single_open
    ON sessions(ifnull(end_ts, 0)) WHERE end_ts IS NULL;

-- One waiting handoff per task
CREATE UNIQUE INDEX IF NOT EXISTS ux_externals_waiting
    ON externals(task_id) WHERE status = 'waiting';

CREATE INDEX IF NOT EXISTS idx_tasks_lifecycle ON tasks(lifecycle);
CREATE INDEX IF NOT EXISTS idx_tasks_project ON tasks(project);
CREATE INDEX IF NOT EXISTS idx_sessions_task_start ON sessions(task_id, start_ts);
CREATE INDEX IF NOT EXISTS idx_sessions_end ON sessions(end_ts);
CREATE INDEX IF NOT EXISTS idx_externals_recipient ON externals(recipient, status);
CREATE INDEX IF NOT EXISTS idx_annotations_task ON annotations(task_id, entry_ts);
CREATE INDEX IF NOT EXISTS idx_annotations_session ON annotations(session_id);
`;

// Project records. Tasks refer to a project by name; existing names are
// registered when the table is created.
export const PROJECTS_SCHEMA_V1 = `
CREATE TABLE IF NOT EXISTS projects (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    name             TEXT NOT NULL UNIQUE,
    archived         INTEGER NOT NULL DEFAULT 0 CHECK (archived IN (0, 1)),
    created_ts       INTEGER NOT NULL,
    modified_ts      INTEGER NOT NULL
);

INSERT OR IGNORE INTO projects (name, created_ts, modified_ts)
    SELECT project, MIN(created_ts), MAX(modified_ts) FROM tasks
    WHERE project IS NOT NULL
    GROUP BY project;
`;

// Audit trail of every fact transition (history only, never read back into state)
export const EVENTS_SCHEMA_V1 = `
CREATE TABLE IF NOT EXISTS events (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    event_id         TEXT NOT NULL UNIQUE,
    task_id          INTEGER NOT NULL,
    type             TEXT NOT NULL,
    data             TEXT NOT NULL CHECK (json_valid(data)),
    timestamp        INTEGER NOT NULL
);

-- Append-only enforcement: prevent UPDATE on events
CREATE TRIGGER IF NOT EXISTS events_no_update
BEFORE UPDATE ON events
BEGIN
    SELECT RAISE(ABORT, 'Events table is append-only: cannot UPDATE');
END;

-- Append-only enforcement: prevent DELETE on events
CREATE TRIGGER IF NOT EXISTS events_no_delete
BEFORE DELETE ON events
BEGIN
    SELECT RAISE(ABORT, 'Events table is append-only: cannot DELETE');
END;

CREATE INDEX IF NOT EXISTS idx_events_task_id_id ON events(task_id, id);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
`;

export const PRAGMAS = `
PRAGMA journal_mode=WAL;
PRAGMA synchronous=NORMAL;
PRAGMA foreign_keys=ON;
PRAGMA busy_timeout=5000;
`;
