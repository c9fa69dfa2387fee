import path from 'path';

export const CONFIG = {
    // 'SIMULATION' | 'REAL'
    MODE: process.env.ORIGAMI_ENGINE_MODE || 'SIMULATION',

    PORT: Number(process.env.ORIGAMI_PORT || 3001),

    // Postgres connection string for the design vault; unset keeps it in memory
    DATABASE_URL: process.env.ORIGAMI_DATABASE_URL,

    // Paths to the external design engine (user must provide these for REAL mode).
    // Relative defaults resolve against the directory the service is started from.
    PATHS: {
        PYTHON: process.env.ORIGAMI_PYTHON || 'python3',
        ENGINE_BRIDGE: path.resolve(process.env.ORIGAMI_ENGINE_BRIDGE || 'bin/daedalus_bridge.py'),
        OUTPUT_DIR: path.resolve(process.env.ORIGAMI_OUTPUT_DIR || 'designs')
    },

    // Simulation Parameters
    SIMULATION: {
        // Length of the M13mp18 scaffold the engine falls back to for small designs
        DEFAULT_SCAFFOLD_LENGTH: 7249
    }
};
