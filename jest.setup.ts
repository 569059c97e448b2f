/**
 * Jest setup file to suppress verbose console output.
 *
 * By default, Jest wraps console methods and shows a stack trace for every
 * console.log/error call. The [API-CLIENT-*] lines the clients write under
 * test read better as plain lines, so Jest's console is replaced with Node's.
 */
import { Console } from 'console';

global.console = new Console(process.stdout, process.stderr);
