export interface ChatTokens {
  tastes: string[]
  ingredients: string[]
}
