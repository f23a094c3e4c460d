export function formatProgressStatus(progress: number, stage: string) {
    return `${stage} (${Math.round(progress * 100)}%)`;
}
