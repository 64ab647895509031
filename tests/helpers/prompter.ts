import type { Prompter } from '../../src/credentials/setup.js'

/**
 * Prompter answering from a script; records questions and printed lines
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = []
  readonly printed: string[] = []
  private readonly answers: string[]

  constructor(answers: string[]) {
    this.answers = [...answers]
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question)
    const answer = this.answers.shift()
    if (answer === undefined) throw new Error(`No scripted answer for: ${question}`)
    return answer
  }

  print(line: string): void {
    this.printed.push(line)
  }
}
