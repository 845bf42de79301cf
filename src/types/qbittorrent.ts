// qBittorrent WebUI API types (the subset read by the scheduler)

export interface QBTorrentInfo {
  hash: string;
  name: string;
  size: number;               // selected files only
  total_size: number;
  amount_left: number;        // bytes
  state: QBTorrentState;
  save_path: string;
  added_on: number;           // unix timestamp
}

export type QBTorrentState =
  | 'error'
  | 'missingFiles'
  | 'uploading'
  | 'pausedUP'
  | 'stoppedUP'              // qBittorrent >= 5.0
  | 'queuedUP'
  | 'stalledUP'
  | 'checkingUP'
  | 'forcedUP'
  | 'allocating'
  | 'downloading'
  | 'metaDL'
  | 'forcedMetaDL'
  | 'pausedDL'
  | 'stoppedDL'              // qBittorrent >= 5.0
  | 'queuedDL'
  | 'stalledDL'
  | 'checkingDL'
  | 'forcedDL'
  | 'checkingResumeData'
  | 'moving'
  | 'unknown';
