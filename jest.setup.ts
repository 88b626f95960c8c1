/**
 * Jest setup: loads reflect-metadata before any decorated class, and swaps
 * Jest's console for Node's so ConsoleLogger lines print without a stack
 * trace each.
 */
import 'reflect-metadata';
import nodeConsole = require('console');

global.console = nodeConsole;
