import { createInterface } from 'node:readline'

export function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = ''
    process.stdin.setEncoding('utf-8')
    process.stdin.on('data', (chunk: string) => {
      data += chunk
    })
    process.stdin.on('end', () => {
      resolve(data.trim())
    })
    process.stdin.on('error', reject)
  })
}

export function promptForInput(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  })
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close()
      resolve(answer)
    })
  })
}

/** Flag value if given, else piped stdin, else an interactive prompt. */
export async function resolveValue(optValue: string | undefined, question: string): Promise<string> {
  if (optValue !== undefined) {
    return optValue
  }
  if (!process.stdin.isTTY) {
    return readStdin()
  }
  return promptForInput(question)
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
