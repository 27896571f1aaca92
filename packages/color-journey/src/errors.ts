export type JourneyErrorCode = 'InvalidConfig'

export class JourneyError extends Error {
	readonly code: JourneyErrorCode
	readonly issues: readonly string[]

	constructor(code: JourneyErrorCode, issues: readonly string[], options?: ErrorOptions) {
		super(`Invalid journey configuration: ${issues.join('; ')}`, options)
		this.name = 'JourneyError'
		this.code = code
		this.issues = issues
	}
}
