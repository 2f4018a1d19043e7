export const sleep = async (ms: number): Promise<void> => {
  if (ms <= 0) {
    return
  }
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms)
  })
}
