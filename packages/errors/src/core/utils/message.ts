/** Set-once: `next` applies only while `current` is empty. */
export function setMessageOnce(current: string, next: string): string {
  return current === "" && next !== "" ? next : current
}

export function appendMessage(current: string, next: string): string {
  if (next === "") return current
  if (current === "") return next
  return `${current}: ${next}`
}

export function causeOption(cause: unknown): ErrorOptions | undefined {
  return cause === undefined ? undefined : { cause }
}
