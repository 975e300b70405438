const DRIVE_FILE_URL = 'https://drive.google.com/file/d';

export function materialDetailPath(materialId: string): string {
  return `/api/materials/${materialId}`;
}

/**
 * Where a download redirects to: a stored URL verbatim, a drive id as its
 * preview page, or the material's own detail endpoint when nothing is stored.
 */
export function resolveDownloadTarget(material: { id: string; fileDriveId: string | null }): string {
  const link = material.fileDriveId;
  if (!link) {
    return materialDetailPath(material.id);
  }
  if (link.startsWith('http')) {
    return link;
  }
  return `${DRIVE_FILE_URL}/${link}/view`;
}
