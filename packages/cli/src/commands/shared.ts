import { readFile } from 'node:fs/promises'
import { BaseCommand, flags } from '@adonisjs/ace'
import { type CompileOptions, type CompileResult, compile } from '@tessera/compiler'
import { formatCompileError, formatExclusions, formatReadError } from '../utils.ts'

/**
 * Reading, compiling and diagnostic reporting shared by `build` and `check`.
 */
export abstract class CompileCommand extends BaseCommand {
	declare input: string

	@flags.boolean({ description: 'Reject storage keys that cannot be resolved statically' })
	declare strictKeys: boolean

	protected async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	protected displayDiagnostics(result: CompileResult): void {
		for (const diagnostic of result.context.getDiagnostics()) {
			const text = result.context.formatDiagnostic(diagnostic)
			if (result.context.getErrors().includes(diagnostic)) this.logger.error(text)
			else if (result.warnings.includes(diagnostic)) this.logger.warning(text)
			else this.logger.info(text)
		}
		if (result.excluded.size > 0) {
			this.logger.error(formatExclusions(result.excluded.size))
			this.exitCode = 1
		}
	}

	protected compileSource(source: string, options: CompileOptions): CompileResult | null {
		try {
			const result = compile(source, {
				...options,
				dynamicKeyPolicy: this.strictKeys ? 'reject' : 'coarsen',
				filename: this.input,
			})
			this.displayDiagnostics(result)
			return result
		} catch (error: unknown) {
			this.logger.error(formatCompileError(error))
			this.exitCode = 1
			return null
		}
	}
}
