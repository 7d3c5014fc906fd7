import os from 'os';
import path from 'path';

// Keep test runs from writing ecs-fleet.log into the working tree
process.env.ECS_FLEET_LOG_FILE = path.join(os.tmpdir(), 'ecs-fleet-test.log');
