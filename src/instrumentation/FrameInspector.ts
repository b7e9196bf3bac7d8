/**
 * FrameInspector
 *
 * Stack-frame introspection over V8 stack strings.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';

export interface StackFrame {
  functionName?: string;
  fileName?: string;
  lineNumber?: number;
  columnNumber?: number;
  isNative: boolean;
  isConstructor: boolean;
  isAsync: boolean;
}

const FRAME_PATTERNS = {
  // functionName (file:line:column)
  named: /^(.+?)\s+\((.+?):(\d+):(\d+)\)$/,
  // file:line:column
  bare: /^(.+?):(\d+):(\d+)$/
};

/**
 * Parse a single `    at ...` line. Returns null for anything else.
 */
export function parseStackLine(line: string): StackFrame | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('at ')) {
    return null;
  }

  const content = trimmed.replace(/^at\s+/, '');

  const isAsync = content.startsWith('async ');
  const withoutAsync = isAsync ? content.replace(/^async\s+/, '') : content;

  const isConstructor = withoutAsync.startsWith('new ');
  const body = isConstructor ? withoutAsync.replace(/^new\s+/, '') : withoutAsync;

  const named = body.match(FRAME_PATTERNS.named);
  if (named) {
    return {
      functionName: named[1],
      fileName: named[2],
      lineNumber: parseInt(named[3], 10),
      columnNumber: parseInt(named[4], 10),
      isNative: isNativeLocation(named[2]),
      isConstructor,
      isAsync
    };
  }

  const bare = body.match(FRAME_PATTERNS.bare);
  if (bare) {
    return {
      fileName: bare[1],
      lineNumber: parseInt(bare[2], 10),
      columnNumber: parseInt(bare[3], 10),
      isNative: isNativeLocation(bare[1]),
      isConstructor,
      isAsync
    };
  }

  // e.g. "Array.map (native)" or "at <anonymous>"
  const nativeMatch = body.match(/^(.+?)\s+\(native\)$/);
  if (nativeMatch || body === 'native') {
    return {
      functionName: nativeMatch ? nativeMatch[1] : undefined,
      isNative: true,
      isConstructor,
      isAsync
    };
  }

  return null;
}

/**
 * Frame of the caller `skip` levels above the function that calls this one.
 * skip = 0 is the direct caller of that function.
 */
export function captureCallerFrame(skip: number = 0): StackFrame | null {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, captureCallerFrame);

  // Frame 0 is the function that called captureCallerFrame
  return frameAt(holder.stack ?? '', skip + 1);
}

/**
 * Parse the `index`th `at` line of a stack string. Lines that fail to parse
 * still occupy their position, so null means that frame is unreadable.
 */
export function frameAt(stack: string, index: number): StackFrame | null {
  const lines = stack.split('\n').filter(line => line.trim().startsWith('at '));
  const line = lines[index];
  return line === undefined ? null : parseStackLine(line);
}

/**
 * Convert a frame's file into a short source label: file URLs become paths,
 * paths under `root` become relative.
 */
export function shortSource(fileName: string, root: string = process.cwd()): string {
  let file = fileName;
  if (file.startsWith('file://')) {
    file = fileURLToPath(file);
  }
  if (path.isAbsolute(file)) {
    const relative = path.relative(root, file);
    if (!relative.startsWith('..') && !path.isAbsolute(relative)) {
      return relative.split(path.sep).join('/');
    }
  }
  return file;
}

/**
 * Short source label for the code that called the function calling this one
 */
export function callerSourceLabel(): string | undefined {
  // 0 = the function calling callerSourceLabel, 1 = its caller
  const frame = captureCallerFrame(1);
  return frame?.fileName ? shortSource(frame.fileName) : undefined;
}

function isNativeLocation(fileName: string): boolean {
  return fileName.startsWith('node:') || fileName === 'native';
}
