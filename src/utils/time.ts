const pad = (value: number): string => String(value).padStart(2, '0');

/** Local wall-clock time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date = new Date()): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
    return `${day} ${time}`;
}
