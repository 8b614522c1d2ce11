export interface IdGenerator {
  generate(): string
}
