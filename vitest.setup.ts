// Load a repo-root .env when present; variables already exported in the shell win.
import 'dotenv/config';
