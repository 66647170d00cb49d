import { spawn } from 'node:child_process'

/** Runs a command to completion and reports its exit status. Output is discarded. */
export interface CommandRunner {
  run(command: string, args: readonly string[]): Promise<number>
}

export const spawnRunner: CommandRunner = {
  run(command, args) {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'ignore' })
      child.once('error', reject)
      // Killed by a signal: no exit code, treat as failure
      child.once('close', (code) => resolve(code ?? 1))
    })
  },
}
