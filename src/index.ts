/**
 * The entrypoint for the action.
 */
import { run } from './main.js'

void run()
