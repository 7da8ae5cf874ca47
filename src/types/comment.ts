export interface Comment {
  id: string
  taskId: string
  userId: string
  userName?: string
  content: string
  createdAt: string // ISO8601
  updatedAt: string // ISO8601
}

export interface CommentInput {
  content: string
}
