import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

export default defineConfig({
  plugins: [react()],
  base: '/wdi-explorer/',
  server: {
    port: 5173
  }
})
