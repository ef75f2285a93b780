export const LAYER_LABEL = 'maubot'

export const MAUBOT_SERVICE = 'maubot'
export const NGINX_SERVICE = 'nginx'
export const BLACKBOX_SERVICE = 'blackbox'

export const MAUBOT_PORT = 29316
export const PROXY_PORT = 8080
export const BLACKBOX_PORT = 9115

export const DATA_DIR = '/data'
export const DATA_SUBDIRS = ['/data/plugins', '/data/trash', '/data/dbs'] as const

export const PROXY_HEALTH_PATH = '/health'
export const MAUBOT_HEALTH_URL = `http://localhost:${MAUBOT_PORT}/_matrix/maubot/v1/version`
export const PROBE_TARGET_URL = `http://127.0.0.1:${MAUBOT_PORT}/_matrix/maubot/`

export const RESERVED_ADMIN_NAME = 'root'
