export enum ValidationMode {
	Strict = "strict",
	Fast = "fast",
}

export enum ViolationAction {
	Throw = "throw",
	Abort = "abort",
	Log = "log",
}

export enum BitVectorState {
	Initialized = "initialized",
	Released = "released",
}
