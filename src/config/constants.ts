/**
 * Configuration constants
 */

export const CLI_NAME = 'message-director';
export const DOTENV_FILENAMES = ['.env', '.env.local'];
