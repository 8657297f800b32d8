/** Body of endpoints that only confirm an action. */
export interface MessageResponseDto {
  message: string;
}
