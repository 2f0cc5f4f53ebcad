/**
 * Slash commands registered by the bot
 */

import { pagesCommand } from './pages.js';
import type { Command } from '../types.js';

export const commands: readonly Command[] = [pagesCommand];
