import IndicatorExplorer from './components/indicators/IndicatorExplorer'
import './App.css'

function App() {
  return (
    <div className="app">
      <h1>World Development Indicators</h1>
      <p className="subtitle">Compare two indicators across countries and follow them over the years</p>
      <IndicatorExplorer />
    </div>
  )
}

export default App
