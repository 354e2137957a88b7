import { args } from '@adonisjs/ace'
import { summarizeManifest } from '../utils.ts'
import { CompileCommand } from './shared.ts'

export default class CheckCommand extends CompileCommand {
	static override commandName = 'check'
	static override description = 'Check a Tessera unit and print its diagnostics and domain sets'

	@args.string({ description: 'Input .tsr file to check' })
	declare input: string

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.compileSource(source, { emitWasm: false })
		if (result === null) return

		for (const line of summarizeManifest(result)) this.logger.info(line)
		if (result.context.hasErrors()) this.exitCode = 1
	}
}
