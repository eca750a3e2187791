/**
 * commands/index.ts
 *
 * Import every command module here. The act of importing triggers each
 * module's self-registration call (registry.register(…)) at the bottom
 * of its file.
 */

import './enter';
import './exit';
import './status';
import './modes';
