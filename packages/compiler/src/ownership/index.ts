export { checkFunction, checkOwnership, type OwnershipViolation } from './checker.ts'
export { type BindingState, type BorrowState, FlowState, type Ownership } from './state.ts'
