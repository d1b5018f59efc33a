export function delay(forMs: number): Promise<void> {
	return new Promise((resolve) => {
		setTimeout(resolve, forMs);
	});
}
