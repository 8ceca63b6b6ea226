export function pad(value: number): string {
    return value.toString().padStart(2, "0");
}

export function toHttpsUrl(value: string): string {
    return value.startsWith("webcal://") ? `https://${value.slice("webcal://".length)}` : value;
}
