process.env.NODE_ENV = 'test'
process.env.STORE_DRIVER = 'memory'
process.env.REDIS_URL = ''
