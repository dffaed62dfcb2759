import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to the real launcher data directory.
process.env['RUNWAY_HOME'] =
	process.env['RUNWAY_HOME'] ??
	path.join(os.tmpdir(), `runway-test-home-${process.pid}`);
